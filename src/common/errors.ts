/** A run depends on a daily document that has not been created yet. */
export class DatasetNotFoundError extends Error {
  constructor(
    readonly day: string,
    readonly filePath: string,
  ) {
    super(`daily dataset not found for ${day}: ${filePath}`);
    this.name = 'DatasetNotFoundError';
  }
}

/** The persisted document exists but cannot be read as a daily dataset. */
export class DatasetCorruptError extends Error {
  constructor(
    readonly filePath: string,
    detail: string,
  ) {
    super(`daily dataset is unreadable: ${filePath}: ${detail}`);
    this.name = 'DatasetCorruptError';
  }
}
