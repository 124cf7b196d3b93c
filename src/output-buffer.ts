// Append-only program output, one record per line
export class OutputBuffer {
  private records: string[] = [];

  append(record: string): void {
    this.records.push(record);
  }

  clear(): void {
    this.records = [];
  }

  toString(): string {
    return this.records.map((record) => `${record}\n`).join('');
  }
}
