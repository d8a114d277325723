/**
 * Raised when a collaborator hands over data that breaks its contract,
 * e.g. a validation tree with an unknown association kind. Not operational.
 */
export class InvariantError extends Error {
  public readonly received: unknown;

  constructor(message: string, received?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.received = received;
    Error.captureStackTrace(this, this.constructor);
  }
}
