import { Logger } from './logger';
import { ExecutionState } from './execution-state';
import { ExpressionEvaluator } from './expression-evaluator';
import { VariableStore } from './variable-store';
import { OutputBuffer } from './output-buffer';
import { stripLabel } from './label-resolver';
import {
  BUILT_IN_STATEMENTS,
  STATEMENT_KINDS,
  StatementContext,
  StatementHandler,
  classifyStatement,
  unsupportedStatement
} from './statements';
import { EvaluationError, LabelResolver, SourcePosition, StatementKind } from './types';

export const INFINITE_LOOP_ERROR = 'Error: Program stopped due to potential infinite loop';

export interface Session {
  state: ExecutionState;
  variables: VariableStore;
  output: OutputBuffer;
  evaluator: ExpressionEvaluator;
}

export interface DispatchOptions {
  maxSteps: number;
  labelResolver: LabelResolver;
  filename?: string;
}

// Drops a trailing `//` comment and the leading line-number label
export function extractStatement(line: string): string {
  let code = line;
  const commentIndex = code.indexOf('//');
  if (commentIndex !== -1) {
    code = code.substring(0, commentIndex).trim();
  }
  return stripLabel(code);
}

export class LineDispatcher {
  private handlers = new Map<StatementKind, StatementHandler>();
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;

    for (const kind of STATEMENT_KINDS) {
      this.handlers.set(kind, BUILT_IN_STATEMENTS[kind]);
    }
  }

  registerStatement(kind: StatementKind, handler: StatementHandler): void {
    this.handlers.set(kind, handler);
    this.logger.debug(`Registered statement handler: ${kind}`);
  }

  restoreBuiltIn(kind: StatementKind): void {
    this.handlers.set(kind, BUILT_IN_STATEMENTS[kind]);
    this.logger.debug(`Restored built-in statement handler: ${kind}`);
  }

  run(session: Session, options: DispatchOptions): void {
    const { state, output } = session;
    state.beginRun();

    while (!state.isFinished()) {
      if (state.hasReachedStepLimit(options.maxSteps)) {
        output.append(INFINITE_LOOP_ERROR);
        this.logger.error(`${INFINITE_LOOP_ERROR} after ${state.getStepCount()} steps`);
        state.halt();
        break;
      }

      const line = state.currentLine();
      this.logger.debug(`Processing line ${state.getCursor() + 1}: ${line}`);
      this.dispatchLine(line, session, options);
      state.advance();
    }

    this.logger.debug(`Program finished running. ${state.toString()}`);
  }

  private dispatchLine(line: string, session: Session, options: DispatchOptions): void {
    const statement = extractStatement(line);

    if (statement === '') {
      this.logger.debug('Skipping empty line or comment-only line.');
      return;
    }

    const kind = classifyStatement(statement);
    const handler = this.handlers.get(kind) ?? unsupportedStatement;
    const context = this.createContext(statement, kind, line, session, options);

    try {
      handler(context);
    } catch (error) {
      // Only a host-registered handler can get here
      const message = error instanceof Error ? error.message : String(error);
      context.reportError(`Error: ${message}`);
    }
  }

  private createContext(
    statement: string,
    kind: StatementKind,
    line: string,
    session: Session,
    options: DispatchOptions
  ): StatementContext {
    const { state, output } = session;
    const lineNumber = state.getCursor() + 1;

    return {
      statement,
      state,
      variables: session.variables,
      output,
      evaluator: session.evaluator,
      logger: this.logger,

      resolveLabel: (target: string) => {
        this.logger.debug(`Finding line index for target line: ${target}`);
        return options.labelResolver(state.getLines(), target);
      },

      reportError: (record: string, error?: EvaluationError, expression?: string) => {
        output.append(record);
        const position = this.positionFor(line, lineNumber, error, expression, options.filename);
        this.logger.statementError(kind, record, position, state.getLines());
      }
    };
  }

  private positionFor(
    line: string,
    lineNumber: number,
    error: EvaluationError | undefined,
    expression: string | undefined,
    filename: string | undefined
  ): SourcePosition {
    let column = 0;
    if (error?.offset !== undefined && expression !== undefined) {
      const expressionStart = line.indexOf(expression);
      if (expressionStart !== -1) {
        column = expressionStart + error.offset + 1;
      }
    }

    const position: SourcePosition = { line: lineNumber, column, length: 1, originalText: line };
    if (filename) {
      position.filename = filename;
    }
    return position;
  }
}
