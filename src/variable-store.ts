export interface VariableLookup {
  get(name: string): number | undefined;
}

export class VariableStore implements VariableLookup {
  private values = new Map<string, number>();

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): number | undefined {
    return this.values.get(name);
  }

  set(name: string, value: number): void {
    this.values.set(name, value);
  }

  clear(): number {
    const count = this.values.size;
    this.values.clear();
    return count;
  }

  toRecord(): Record<string, number> {
    return Object.fromEntries(this.values);
  }
}
