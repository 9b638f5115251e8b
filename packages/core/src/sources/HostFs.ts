/**
 * A re-readable view of the kernel's counter files. Every read returns the
 * current state; whether an implementation reopens or caches handles is its
 * own business.
 */
export interface HostFs {
  /** Filesystem root the absolute `/proc` and `/sys` paths are resolved under. */
  readonly root: string;

  /** Throws `SourceUnavailableError` when the path cannot be read. */
  readText(path: string): string;

  /** Throws `SourceUnavailableError` when the directory cannot be listed. */
  listDir(path: string): string[];

  exists(path: string): boolean;
}
