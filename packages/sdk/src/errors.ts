export class InvalidArgumentError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "InvalidArgumentError";
    (this as unknown as { cause?: unknown }).cause = cause;
  }
}

/**
 * Raised when serialized data cannot be decoded.
 * `label` is the dotted path of the offending field, when one is known.
 */
export class MalformedDataError extends Error {
  readonly label?: string;
  constructor(message: string, label?: string, cause?: unknown) {
    super(label ? `${label}: ${message}` : message);
    this.name = "MalformedDataError";
    this.label = label;
    (this as unknown as { cause?: unknown }).cause = cause;
  }
}
