import { SourcePosition } from './types';

export class Logger {
  private enabled: boolean;

  constructor(enabled: boolean = false) {
    this.enabled = enabled;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled) {
      console.log(`[LineBasic DEBUG] ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled) {
      console.warn(`[LineBasic WARN] ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled) {
      console.error(`[LineBasic ERROR] ${message}`, ...args);
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  // Error report with position information and surrounding program lines
  errorWithPosition(message: string, position?: SourcePosition, context?: readonly string[]): void {
    if (!this.enabled) return;
    console.error(this.formatError(message, position, context));
  }

  formatError(message: string, position?: SourcePosition, context?: readonly string[]): string {
    let errorMessage = `[LineBasic ERROR] ${message}`;

    if (position) {
      const filename = position.filename || '<program>';
      errorMessage += `\n  at line ${position.line}`;
      if (position.column > 0) {
        errorMessage += `, column ${position.column}`;
      }
      errorMessage += ` in ${filename}`;

      if (context && context.length > 0) {
        errorMessage += this.formatSourceContext(position, context);
      }
    }

    return errorMessage;
  }

  // One line above and below the failing line, numbered, with a caret row
  private formatSourceContext(position: SourcePosition, context: readonly string[]): string {
    const first = Math.max(1, position.line - 1);
    const last = Math.min(context.length, position.line + 1);
    const rows: string[] = [];

    for (let lineNum = first; lineNum <= last; lineNum++) {
      const marker = lineNum === position.line ? '>' : ' ';
      rows.push(`  ${marker} ${String(lineNum).padStart(3)} | ${context[lineNum - 1]}`);

      if (lineNum === position.line && position.column > 0) {
        const gutter = ' '.repeat(8) + '| ';
        rows.push(gutter + ' '.repeat(position.column - 1) + '^'.repeat(Math.max(1, position.length)));
      }
    }

    return `\n\n${rows.join('\n')}`;
  }

  statementError(statement: string, message: string, position?: SourcePosition, context?: readonly string[]): void {
    this.errorWithPosition(`Error in '${statement}' statement: ${message}`, position, context);
  }
}
