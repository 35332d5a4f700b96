export class ConfigurationError extends Error {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown) {
    super(`${field} must be a positive integer, got ${String(value)}`);
    this.name = "ConfigurationError";
    this.field = field;
    this.value = value;
  }
}
