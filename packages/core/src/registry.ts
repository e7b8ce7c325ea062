/**
 * Generic registry for pluggable implementations.
 */

interface Entry<T> {
  readonly factory: () => T;
  readonly description: string;
}

export class Registry<T> {
  private readonly _map = new Map<string, Entry<T>>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, factory: () => T, description = ""): void {
    this._map.set(name, { factory, description });
  }

  /** Build a fresh instance; throws for an unregistered name. */
  get(name: string): T {
    const entry = this._map.get(name);
    if (!entry) {
      const avail = this.list().join(", ");
      throw new Error(
        `[${this.subsystem}] Unknown implementation "${name}". Available: ${avail}`
      );
    }
    return entry.factory();
  }

  has(name: string): boolean {
    return this._map.has(name);
  }

  list(): string[] {
    return [...this._map.keys()];
  }

  /** One `name  description` line per entry, for help output. */
  describe(): string[] {
    const width = Math.max(0, ...this.list().map((n) => n.length));
    return [...this._map].map(([name, e]) =>
      e.description ? `${name.padEnd(width)}  ${e.description}` : name,
    );
  }
}
