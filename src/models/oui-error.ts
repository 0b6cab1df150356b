export type OuiErrorKind =
  | "SourceUnavailable"
  | "MalformedBlockNotation"
  | "InvalidMask"
  | "TableSchemaMismatch"
  | "EncodingError"
  | "AddressParseError";

/**
 * Error raised while loading or querying the OUI database.
 * `value` holds the offending input when there is one.
 */
export class OuiError extends Error {
  public readonly kind: OuiErrorKind;
  public readonly value?: string;

  constructor(kind: OuiErrorKind, message: string, value?: string) {
    super(message);
    this.name = "OuiError";
    this.kind = kind;
    this.value = value;
  }

  /**
   * Copy of this error with a context prefix on the message
   */
  withContext(context: string): OuiError {
    return new OuiError(this.kind, `${context}: ${this.message}`, this.value);
  }
}
