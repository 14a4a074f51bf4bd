export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class FragmentUnreadableError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot read fragment ${filePath}: ${reason}`);
    this.name = "FragmentUnreadableError";
    this.filePath = filePath;
  }
}

export class UnsafeArchivePathError extends Error {
  readonly entryPath: string;

  constructor(entryPath: string) {
    super(`Blocked path traversal attempt: ${entryPath}`);
    this.name = "UnsafeArchivePathError";
    this.entryPath = entryPath;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
