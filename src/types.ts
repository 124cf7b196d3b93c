export interface SourcePosition {
  line: number;
  column: number;
  length: number;
  originalText: string;
  filename?: string;
}

export type EvaluationErrorKind =
  | 'undefined-variable'
  | 'invalid-factor'
  | 'invalid-number'
  | 'invalid-condition';

export interface EvaluationError {
  kind: EvaluationErrorKind;
  message: string;
  // Offset into the expression text, when the failure has one
  offset?: number;
}

export type EvalResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: EvaluationError };

export type StatementKind = 'print' | 'assignment' | 'if' | 'goto' | 'end' | 'unsupported';

// Returns the program index of the line addressed by `target`, or -1.
export type LabelResolver = (lines: readonly string[], target: string) => number;

export interface LineBasicConfig {
  // Debug settings
  debug?: boolean;

  // Dispatch iterations allowed per run before the program is stopped
  maxSteps?: number;

  // Jump target lookup
  labelResolver?: LabelResolver;

  // Used in diagnostics only
  filename?: string;
}

export type ResolvedConfig = Required<Omit<LineBasicConfig, 'filename'>> & {
  filename?: string;
};
