import { VariableLookup } from './variable-store';
import { EvalResult, EvaluationError, EvaluationErrorKind } from './types';

// Scanned in this order; the first operator found splits the condition
export const CONDITION_OPERATORS = ['=', '>', '<', '>=', '<='] as const;

export type ComparisonOperator = typeof CONDITION_OPERATORS[number];

const DIGIT_OR_POINT = /[0-9.]/;
const LETTER = /\p{L}/u;
const WHITESPACE = /\s/;

// Offset into one expression's text; never outlives the evaluate() call that made it
class ParseCursor {
  pos: number = 0;

  constructor(readonly text: string) {}

  atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string {
    return this.text.charAt(this.pos);
  }

  takeWhile(pattern: RegExp): string {
    const start = this.pos;
    while (!this.atEnd() && pattern.test(this.peek())) {
      this.pos++;
    }
    return this.text.substring(start, this.pos);
  }
}

function ok<T>(value: T): EvalResult<T> {
  return { ok: true, value };
}

function fail<T>(kind: EvaluationErrorKind, message: string, offset?: number): EvalResult<T> {
  const error: EvaluationError = { kind, message };
  if (offset !== undefined) {
    error.offset = offset;
  }
  return { ok: false, error };
}

/**
 * Recursive-descent evaluator for `+ - * /` arithmetic over numbers,
 * parenthesised groups and variables.
 *
 * Parsing stops at the first character that cannot continue the current
 * expression, so trailing text is ignored. Whitespace is only skipped where a
 * factor starts: `2 + 3` evaluates to 2.
 */
export class ExpressionEvaluator {
  constructor(private readonly variables: VariableLookup) {}

  evaluate(expression: string): EvalResult<number> {
    return this.parseExpression(new ParseCursor(expression));
  }

  evaluateCondition(condition: string): EvalResult<boolean> {
    let operator: ComparisonOperator | null = null;
    let opIndex = -1;

    for (const op of CONDITION_OPERATORS) {
      opIndex = condition.indexOf(op);
      if (opIndex !== -1) {
        operator = op;
        break;
      }
    }

    if (operator === null) {
      return fail('invalid-condition', `Invalid condition: ${condition}`);
    }

    // Error offsets are reported relative to the whole condition
    const left = this.resolveOperand(condition, 0, opIndex);
    if (!left.ok) return left;
    const right = this.resolveOperand(condition, opIndex + operator.length, condition.length);
    if (!right.ok) return right;

    return ok(compare(operator, left.value, right.value));
  }

  // A bare variable name reads the store directly; anything else is parsed
  private resolveOperand(condition: string, from: number, to: number): EvalResult<number> {
    const raw = condition.substring(from, to);
    const text = raw.trim();
    const stored = this.variables.get(text);
    if (stored !== undefined) {
      return ok(stored);
    }

    const result = this.evaluate(text);
    if (!result.ok && result.error.offset !== undefined) {
      const leading = raw.length - raw.trimStart().length;
      return fail(result.error.kind, result.error.message, from + leading + result.error.offset);
    }
    return result;
  }

  private parseExpression(cursor: ParseCursor): EvalResult<number> {
    const first = this.parseTerm(cursor);
    if (!first.ok) return first;

    let result = first.value;
    while (!cursor.atEnd()) {
      const ch = cursor.peek();
      if (ch !== '+' && ch !== '-') break;

      cursor.pos++;
      const next = this.parseTerm(cursor);
      if (!next.ok) return next;
      result = ch === '+' ? result + next.value : result - next.value;
    }
    return ok(result);
  }

  private parseTerm(cursor: ParseCursor): EvalResult<number> {
    const first = this.parseFactor(cursor);
    if (!first.ok) return first;

    let result = first.value;
    while (!cursor.atEnd()) {
      const ch = cursor.peek();
      if (ch !== '*' && ch !== '/') break;

      cursor.pos++;
      const next = this.parseFactor(cursor);
      if (!next.ok) return next;
      // Division by zero yields Infinity or NaN
      result = ch === '*' ? result * next.value : result / next.value;
    }
    return ok(result);
  }

  private parseFactor(cursor: ParseCursor): EvalResult<number> {
    cursor.takeWhile(WHITESPACE);

    if (cursor.atEnd()) {
      return fail('invalid-factor', `Invalid factor at position: ${cursor.pos}`, cursor.pos);
    }

    const ch = cursor.peek();

    if (ch === '(') {
      cursor.pos++;
      const inner = this.parseExpression(cursor);
      if (!inner.ok) return inner;
      // A missing ')' is tolerated
      if (cursor.peek() === ')') {
        cursor.pos++;
      }
      return inner;
    }

    if (DIGIT_OR_POINT.test(ch)) {
      const start = cursor.pos;
      const literal = cursor.takeWhile(DIGIT_OR_POINT);
      const value = Number(literal);
      if (Number.isNaN(value)) {
        return fail('invalid-number', `Invalid number: ${literal}`, start);
      }
      return ok(value);
    }

    if (LETTER.test(ch)) {
      const start = cursor.pos;
      const name = cursor.takeWhile(LETTER);
      const value = this.variables.get(name);
      if (value === undefined) {
        return fail('undefined-variable', `Undefined variable: ${name}`, start);
      }
      return ok(value);
    }

    return fail('invalid-factor', `Invalid factor at position: ${cursor.pos}`, cursor.pos);
  }
}

export function compare(operator: ComparisonOperator, left: number, right: number): boolean {
  switch (operator) {
    case '=': return left === right;
    case '>': return left > right;
    case '<': return left < right;
    case '>=': return left >= right;
    case '<=': return left <= right;
  }
}
