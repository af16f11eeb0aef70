export class StorageUnavailable extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageUnavailable';
    this.path = path;
  }
}

export class InvalidRecord extends Error {
  readonly issues: readonly string[];

  constructor(kind: string, issues: readonly string[]) {
    super(`Invalid ${kind}: ${issues.join('; ')}`);
    this.name = 'InvalidRecord';
    this.issues = issues;
  }
}
