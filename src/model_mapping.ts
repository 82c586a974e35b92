/**
 * Runtime model-name mapping. Requests that name an alias are rewritten to the
 * upstream model before endpoint selection; the table can be edited through the
 * admin routes and reset to what the configuration started with.
 */
export class ModelMapping {
  private readonly initial: Readonly<Record<string, string>>;
  private table: Map<string, string>;

  constructor(initial: Record<string, string>) {
    this.initial = { ...initial };
    this.table = new Map(Object.entries(initial));
  }

  resolve(model: string): string {
    const key = model.trim();
    return this.table.get(key) ?? key;
  }

  set(from: string, to: string): void {
    this.table.set(from.trim(), to.trim());
  }

  delete(from: string): boolean {
    return this.table.delete(from.trim());
  }

  reset(): void {
    this.table = new Map(Object.entries(this.initial));
  }

  toJSON(): Record<string, string> {
    return Object.fromEntries(this.table);
  }
}
