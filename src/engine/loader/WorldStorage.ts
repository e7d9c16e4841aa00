// ─────────────────────────────────────────────
//  WorldStorage — per-world text file storage
//  Implementations: FileWorldStorage (disk), MemoryWorldStorage (tests).
//  Synchronous on purpose: every caller runs inside one tick.
// ─────────────────────────────────────────────

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';

export interface IWorldStorage {
  exists(fileName: string): boolean;
  /** Throws when the file cannot be read. */
  read(fileName: string): string;
  /** Replaces the whole file. Throws when the file cannot be written. */
  write(fileName: string, contents: string): void;
}

export class FileWorldStorage implements IWorldStorage {
  constructor(private readonly dir: string) {}

  exists(fileName: string): boolean {
    return existsSync(this.resolve(fileName));
  }

  read(fileName: string): string {
    return readFileSync(this.resolve(fileName), 'utf8');
  }

  write(fileName: string, contents: string): void {
    mkdirSync(this.dir, { recursive: true });
    writeFileSync(this.resolve(fileName), contents, 'utf8');
  }

  private resolve(fileName: string): string {
    return path.join(this.dir, fileName);
  }
}

export class MemoryWorldStorage implements IWorldStorage {
  private files = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [name, contents] of Object.entries(initial)) {
      this.files.set(name, contents);
    }
  }

  exists(fileName: string): boolean {
    return this.files.has(fileName);
  }

  read(fileName: string): string {
    const contents = this.files.get(fileName);
    if (contents === undefined) throw new Error(`No such file: ${fileName}`);
    return contents;
  }

  write(fileName: string, contents: string): void {
    this.files.set(fileName, contents);
  }
}
