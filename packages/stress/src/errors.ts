export class InsufficientResourceError extends Error {
  readonly code = 'insufficient-resource';

  constructor(message: string) {
    super(message);
    this.name = 'InsufficientResourceError';
  }
}
