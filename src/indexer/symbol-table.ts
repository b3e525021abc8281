/**
 * Global symbol table: function name -> owning file.
 *
 * Built once per run before any file is processed and shared read-only.
 * When two files define the same name the last indexed definition wins;
 * the losing owners are kept in `collisions()` so callers can report them.
 */

import type { CFunction } from "./types.js";

export interface SymbolEntry {
  readonly name: string;
  readonly filePath: string;
  readonly fn: CFunction;
}

export interface SymbolCollision {
  readonly name: string;
  /** Every file that defined the name, in indexing order */
  readonly filePaths: readonly string[];
}

export class SymbolTable {
  private readonly entries: ReadonlyMap<string, SymbolEntry>;
  private readonly duplicates: readonly SymbolCollision[];

  private constructor(entries: Map<string, SymbolEntry>, duplicates: SymbolCollision[]) {
    this.entries = entries;
    this.duplicates = duplicates;
    Object.freeze(this);
  }

  /**
   * Build from per-file function lists, in indexing order
   */
  static fromFiles(files: Iterable<{ filePath: string; functions: readonly CFunction[] }>): SymbolTable {
    const entries = new Map<string, SymbolEntry>();
    const owners = new Map<string, string[]>();

    for (const file of files) {
      for (const fn of file.functions) {
        entries.set(fn.name, Object.freeze({ name: fn.name, filePath: file.filePath, fn: Object.freeze({ ...fn }) }));
        const list = owners.get(fn.name) ?? [];
        list.push(file.filePath);
        owners.set(fn.name, list);
      }
    }

    const duplicates: SymbolCollision[] = [];
    for (const [name, filePaths] of owners) {
      if (new Set(filePaths).size > 1) {
        duplicates.push(Object.freeze({ name, filePaths: Object.freeze([...filePaths]) }));
      }
    }

    return new SymbolTable(entries, duplicates);
  }

  static empty(): SymbolTable {
    return new SymbolTable(new Map(), []);
  }

  get size(): number {
    return this.entries.size;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  ownerOf(name: string): string | undefined {
    return this.entries.get(name)?.filePath;
  }

  lookup(name: string): SymbolEntry | undefined {
    return this.entries.get(name);
  }

  /** Number of distinct owning files */
  fileCount(): number {
    return new Set([...this.entries.values()].map((e) => e.filePath)).size;
  }

  collisions(): readonly SymbolCollision[] {
    return this.duplicates;
  }
}
