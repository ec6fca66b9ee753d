/**
 * Raised when a static data file is missing or fails validation.
 */
export class DataLoadError extends Error {
  constructor(
    public readonly file: string,
    public readonly details: string
  ) {
    super(`Failed to load ${file}: ${details}`);
    this.name = "DataLoadError";
  }
}
