export const INVALID_ARGUMENT = "INVALID_ARGUMENT";

export class InvalidArgumentError extends Error {
  public readonly code = INVALID_ARGUMENT;
  public readonly argument: string;
  public readonly value: unknown;

  constructor(argument: string, value: unknown, message?: string) {
    super(message ?? `${argument} must be a positive integer, got ${String(value)}.`);
    this.name = "InvalidArgumentError";
    this.argument = argument;
    this.value = value;
  }
}

export const assertPositiveInteger = (value: number, argument: string) => {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidArgumentError(argument, value);
  }
};
