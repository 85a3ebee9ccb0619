export class ValidationError extends Error {
  constructor(
    message: string,
    /** Every failed check, in the order they were evaluated. */
    public readonly issues: string[] = [message],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}
