export interface ExecutionSnapshot {
  cursor: number;
  steps: number;
  halted: boolean;
}

export class ExecutionState {
  private lines: readonly string[] = [];
  private cursor: number = 0;
  private steps: number = 0;
  private halted: boolean = false;
  private pendingJump: number | null = null;

  load(lines: readonly string[]): void {
    this.lines = lines.slice();
    this.cursor = 0;
    this.steps = 0;
    this.halted = false;
    this.pendingJump = null;
  }

  getLines(): readonly string[] {
    return this.lines;
  }

  getCursor(): number {
    return this.cursor;
  }

  getStepCount(): number {
    return this.steps;
  }

  currentLine(): string {
    return this.lines[this.cursor] ?? '';
  }

  isFinished(): boolean {
    return this.cursor >= this.lines.length;
  }

  isHalted(): boolean {
    return this.halted;
  }

  hasReachedStepLimit(maxSteps: number): boolean {
    return this.steps >= maxSteps;
  }

  // Replaces the next +1 advance; the cursor lands exactly on `index`
  jumpTo(index: number): void {
    this.pendingJump = Math.max(0, Math.min(index, this.lines.length));
  }

  end(): void {
    this.pendingJump = this.lines.length;
  }

  halt(): void {
    this.halted = true;
  }

  // The step counter carries over between runs; only load() resets it
  beginRun(): void {
    this.halted = false;
    this.pendingJump = null;
  }

  advance(): void {
    if (this.pendingJump !== null) {
      this.cursor = this.pendingJump;
      this.pendingJump = null;
    } else {
      this.cursor = Math.min(this.cursor + 1, this.lines.length);
    }
    this.steps++;
  }

  // Get a snapshot for inspection between runs
  getSnapshot(): ExecutionSnapshot {
    return {
      cursor: this.cursor,
      steps: this.steps,
      halted: this.halted
    };
  }

  toString(): string {
    return `ExecutionState(cursor: ${this.cursor}/${this.lines.length}, steps: ${this.steps}${this.halted ? ', halted' : ''})`;
  }
}
