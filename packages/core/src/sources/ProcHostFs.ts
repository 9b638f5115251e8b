import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { SourceUnavailableError } from '@tickscope/shared';
import type { HostFs } from './HostFs.js';

function errorCode(err: unknown): string {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return err instanceof Error ? err.message : String(err);
}

/** Synchronous reads of the live `/proc` and `/sys` trees below `root`. */
export class ProcHostFs implements HostFs {
  readonly root: string;

  constructor(root: string = '/') {
    this.root = root;
  }

  readText(path: string): string {
    try {
      return readFileSync(this.resolve(path), 'utf-8');
    } catch (err) {
      throw new SourceUnavailableError(path, errorCode(err));
    }
  }

  listDir(path: string): string[] {
    try {
      return readdirSync(this.resolve(path));
    } catch (err) {
      throw new SourceUnavailableError(path, errorCode(err));
    }
  }

  exists(path: string): boolean {
    return existsSync(this.resolve(path));
  }

  private resolve(path: string): string {
    return this.root === '/' ? path : join(this.root, path);
  }
}
