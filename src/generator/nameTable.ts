/**
 * Hands out unique identifiers within one scope: the first claim of a name
 * gets it unchanged, later claims get `name_1`, `name_2`, ...
 */
export class NameTable {
  private readonly used = new Set<string>();
  private readonly counters = new Map<string, number>();

  constructor(taken: Iterable<string> = []) {
    for (const name of taken) this.used.add(name);
  }

  claim(name: string): string {
    if (!this.used.has(name)) {
      this.used.add(name);
      return name;
    }

    let n = this.counters.get(name) ?? 1;
    let candidate = `${name}_${n}`;
    while (this.used.has(candidate)) {
      n++;
      candidate = `${name}_${n}`;
    }
    this.counters.set(name, n + 1);
    this.used.add(candidate);
    return candidate;
  }

  has(name: string): boolean {
    return this.used.has(name);
  }
}
