/** Raised before any aggregation when the requested window cannot be used. */
export class InvalidWindowError extends Error {
  readonly code = 'invalid_window' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidWindowError';
  }
}
