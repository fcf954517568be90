/**
 * Raised when a caller hands the library an argument it cannot work with,
 * e.g. an unknown step type. This is a caller bug, not a driver failure.
 */
export class StepArgumentError extends Error {
  argument: string;
  details?: Record<string, unknown>;

  constructor(argument: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'StepArgumentError';
    this.argument = argument;
    this.details = details;
  }
}
