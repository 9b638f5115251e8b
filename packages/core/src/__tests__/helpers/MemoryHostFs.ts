import { SourceUnavailableError } from '@tickscope/shared';
import type { HostFs } from '../../sources/HostFs.js';

/** In-process stand-in for `/proc` and `/sys`; contents are swapped between ticks. */
export class MemoryHostFs implements HostFs {
  readonly root = '/';
  private files: Map<string, string> = new Map();

  set(path: string, content: string): this {
    this.files.set(path, content);
    return this;
  }

  remove(path: string): this {
    this.files.delete(path);
    return this;
  }

  /** Removes every file below `dir`. */
  removeDir(dir: string): this {
    for (const path of [...this.files.keys()]) {
      if (path.startsWith(`${dir}/`)) this.files.delete(path);
    }
    return this;
  }

  readText(path: string): string {
    const content = this.files.get(path);
    if (content === undefined) {
      throw new SourceUnavailableError(path, 'ENOENT');
    }
    return content;
  }

  listDir(path: string): string[] {
    const prefix = `${path}/`;
    const entries = new Set<string>();
    for (const file of this.files.keys()) {
      if (file.startsWith(prefix)) {
        entries.add(file.slice(prefix.length).split('/')[0]);
      }
    }
    if (entries.size === 0) {
      throw new SourceUnavailableError(path, 'ENOENT');
    }
    return [...entries].sort();
  }

  exists(path: string): boolean {
    if (this.files.has(path)) return true;
    for (const file of this.files.keys()) {
      if (file.startsWith(`${path}/`)) return true;
    }
    return false;
  }
}
