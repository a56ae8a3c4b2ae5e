/**
 * Error thrown when extracted text cannot be appended to its output file.
 */
export class OutputWriteError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly filePath: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'OutputWriteError';
  }
}
