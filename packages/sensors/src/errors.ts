export class SourceUnavailableError extends Error {
  readonly code = 'source-unavailable';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SourceUnavailableError';
  }
}
