import { Logger } from './logger';
import { ExecutionState, ExecutionSnapshot } from './execution-state';
import { ExpressionEvaluator } from './expression-evaluator';
import { VariableStore } from './variable-store';
import { OutputBuffer } from './output-buffer';
import { LineDispatcher, Session } from './line-dispatcher';
import { prefixLabelResolver } from './label-resolver';
import { StatementHandler } from './statements';
import { LineBasicConfig, ResolvedConfig, StatementKind } from './types';

export const DEFAULT_MAX_STEPS = 100;

/**
 * Splits on `\n` and drops trailing empty segments, so a final newline does
 * not add a line. Input with no newline at all is kept as one line.
 */
export function splitLines(sourceText: string): string[] {
  const segments = sourceText.split('\n');
  if (segments.length === 1) {
    return segments;
  }
  while (segments.length > 0 && segments[segments.length - 1] === '') {
    segments.pop();
  }
  return segments;
}

/**
 * One interpreter session: the loaded program, its cursor, the variable
 * store and the output buffer. Instances share nothing.
 *
 * Not reentrant: do not call `run` or `load` while another `run` on the same
 * instance is in progress.
 */
export class LineBasic {
  private logger: Logger;
  private dispatcher: LineDispatcher;
  private config: ResolvedConfig;
  private session: Session;

  constructor(config: LineBasicConfig = {}) {
    this.logger = new Logger(config.debug ?? false);
    this.config = this.resolveConfig(config, {
      debug: false,
      maxSteps: DEFAULT_MAX_STEPS,
      labelResolver: prefixLabelResolver
    });
    this.dispatcher = new LineDispatcher(this.logger);

    const variables = new VariableStore();
    this.session = {
      state: new ExecutionState(),
      variables,
      output: new OutputBuffer(),
      evaluator: new ExpressionEvaluator(variables)
    };

    this.logger.debug('LineBasic initialized');
  }

  configure(config: Partial<LineBasicConfig>): void {
    this.config = this.resolveConfig(config, this.config);
    this.logger.setEnabled(this.config.debug);
  }

  getConfig(): Readonly<ResolvedConfig> {
    return this.config;
  }

  private resolveConfig(config: Partial<LineBasicConfig>, base: ResolvedConfig): ResolvedConfig {
    let maxSteps = config.maxSteps ?? base.maxSteps;
    if (!Number.isFinite(maxSteps) || maxSteps < 0) {
      this.logger.warn(`Ignoring invalid maxSteps ${maxSteps}, using ${base.maxSteps}`);
      maxSteps = base.maxSteps;
    }

    return {
      debug: config.debug ?? base.debug,
      maxSteps: Math.floor(maxSteps),
      labelResolver: config.labelResolver ?? base.labelResolver,
      filename: 'filename' in config ? config.filename : base.filename
    };
  }

  load(sourceText: string): void {
    this.logger.debug('Loading program...');
    const lines = splitLines(sourceText).map((line) => line.trim());
    for (const line of lines) {
      this.logger.debug(`Loaded line: ${line}`);
    }

    this.session.state.load(lines);
    this.session.output.clear();
  }

  run(): void {
    this.logger.debug('Running program...');
    this.dispatcher.run(this.session, {
      maxSteps: this.config.maxSteps,
      labelResolver: this.config.labelResolver,
      filename: this.config.filename
    });
  }

  getOutput(): string {
    return this.session.output.toString();
  }

  clearVariables(): void {
    const count = this.session.variables.clear();
    this.session.output.clear();
    this.logger.debug(`Cleared ${count} variables`);
  }

  // load + run, returning the output
  execute(sourceText: string): string {
    this.load(sourceText);
    this.run();
    return this.getOutput();
  }

  getVariables(): Record<string, number> {
    return this.session.variables.toRecord();
  }

  getProgram(): readonly string[] {
    return this.session.state.getLines();
  }

  getStepCount(): number {
    return this.session.state.getStepCount();
  }

  // Whether the last run was stopped by the step ceiling
  wasHalted(): boolean {
    return this.session.state.isHalted();
  }

  getSnapshot(): ExecutionSnapshot {
    return this.session.state.getSnapshot();
  }

  registerStatement(kind: StatementKind, handler: StatementHandler): void {
    this.dispatcher.registerStatement(kind, handler);
  }

  restoreStatement(kind: StatementKind): void {
    this.dispatcher.restoreBuiltIn(kind);
  }
}
