export class CatalogError extends Error {
  public readonly file: string;

  constructor(message: string, file: string, options?: { cause?: unknown }) {
    super(`${message}: ${file}`, options);
    this.name = this.constructor.name;
    this.file = file;
    Error.captureStackTrace(this, this.constructor);
  }
}
