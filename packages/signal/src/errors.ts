/**
 * Thrown when a control input falls outside the signal alphabet.
 * The store is never touched when this is thrown.
 */
export class InvalidInputError extends Error {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, detail?: string) {
    super(`Invalid ${field}: ${JSON.stringify(value) ?? String(value)}${detail ? ` (${detail})` : ''}`);
    this.name = 'InvalidInputError';
    this.field = field;
    this.value = value;
  }
}
