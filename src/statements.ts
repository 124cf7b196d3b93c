import { Logger } from './logger';
import { ExecutionState } from './execution-state';
import { ExpressionEvaluator } from './expression-evaluator';
import { VariableStore } from './variable-store';
import { OutputBuffer } from './output-buffer';
import { formatNumber } from './format';
import { EvaluationError, StatementKind } from './types';

export interface StatementContext {
  // Line text with comment and label removed
  statement: string;

  state: ExecutionState;
  variables: VariableStore;
  output: OutputBuffer;
  evaluator: ExpressionEvaluator;
  logger: Logger;

  // Program index for a jump target, or -1
  resolveLabel(target: string): number;

  // Appends `record` to the output and logs it against the current line
  reportError(record: string, error?: EvaluationError, expression?: string): void;
}

export type StatementHandler = (context: StatementContext) => void;

export function classifyStatement(statement: string): StatementKind {
  if (statement.startsWith('print')) return 'print';
  if (statement.includes('=') && !statement.includes('goto')) return 'assignment';
  if (statement.startsWith('if')) return 'if';
  if (statement.startsWith('goto')) return 'goto';
  if (statement === 'end') return 'end';
  return 'unsupported';
}

export const printStatement: StatementHandler = (ctx) => {
  const expression = ctx.statement.substring('print'.length).trim();
  const result = ctx.evaluator.evaluate(expression);

  if (!result.ok) {
    ctx.reportError(`Error evaluating print expression: ${result.error.message}`, result.error, expression);
    return;
  }

  const text = formatNumber(result.value);
  ctx.output.append(text);
  ctx.logger.debug(`Print result: ${text}`);
};

export const assignmentStatement: StatementHandler = (ctx) => {
  const compact = ctx.statement.replace(/\s/g, '');
  const equalIndex = compact.indexOf('=');
  if (equalIndex === -1) {
    ctx.reportError("Error: No '=' found in expression.");
    return;
  }

  const name = compact.substring(0, equalIndex);
  const expression = compact.substring(equalIndex + 1);
  const result = ctx.evaluator.evaluate(expression);

  if (!result.ok) {
    ctx.reportError(`Error evaluating expression for ${name}: ${result.error.message}`, result.error);
    return;
  }

  ctx.variables.set(name, result.value);
  ctx.output.append(`${name} = ${formatNumber(result.value)}`);
  ctx.logger.debug(`Assigned ${name} = ${result.value}`);
};

export const ifStatement: StatementHandler = (ctx) => {
  let clause = ctx.statement.substring('if'.length).trim();

  // if (condition) goto label
  if (clause.startsWith('(') && clause.includes(')')) {
    const closingParenIndex = clause.indexOf(')');
    const conditionPart = clause.substring(1, closingParenIndex).trim();
    const remainingPart = clause.substring(closingParenIndex + 1).trim();

    if (remainingPart.startsWith('goto')) {
      clause = `${conditionPart} ${remainingPart}`;
    }
  }

  const gotoIndex = clause.indexOf('goto');
  if (gotoIndex === -1) {
    ctx.reportError("Error: 'if' statement missing 'goto'");
    return;
  }

  const condition = clause.substring(0, gotoIndex).trim();
  const target = clause.substring(gotoIndex + 'goto'.length).trim();
  const result = ctx.evaluator.evaluateCondition(condition);

  if (!result.ok) {
    ctx.reportError(`Error evaluating 'if' condition: ${result.error.message}`, result.error, condition);
    return;
  }

  if (!result.value) {
    ctx.logger.debug('Condition not met, continuing to next line.');
    return;
  }

  // An unknown target on a true condition is not reported
  const targetIndex = ctx.resolveLabel(target);
  if (targetIndex === -1) {
    ctx.logger.debug(`Condition met but target line ${target} not found, continuing.`);
    return;
  }

  ctx.logger.debug(`Condition met, jumping to line ${target} (index ${targetIndex})`);
  ctx.state.jumpTo(targetIndex);
};

export const gotoStatement: StatementHandler = (ctx) => {
  const target = ctx.statement.substring('goto'.length).trim();
  const targetIndex = ctx.resolveLabel(target);

  if (targetIndex === -1) {
    ctx.reportError(`Error: 'goto' target line not found: ${target}`);
    return;
  }

  ctx.logger.debug(`Jumping to line ${target} (index ${targetIndex})`);
  ctx.state.jumpTo(targetIndex);
};

export const endStatement: StatementHandler = (ctx) => {
  ctx.state.end();
  ctx.logger.debug('End of program encountered.');
};

export const unsupportedStatement: StatementHandler = (ctx) => {
  ctx.reportError(`Error: Unsupported statement: ${ctx.statement}`);
};

// Dispatch priority order
export const STATEMENT_KINDS: readonly StatementKind[] = ['print', 'assignment', 'if', 'goto', 'end', 'unsupported'];

export const BUILT_IN_STATEMENTS: Record<StatementKind, StatementHandler> = {
  print: printStatement,
  assignment: assignmentStatement,
  if: ifStatement,
  goto: gotoStatement,
  end: endStatement,
  unsupported: unsupportedStatement
};
