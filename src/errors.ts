export enum PgfErrorCode {
  UnexpectedEof = "unexpected_eof",
  ImplausibleLength = "implausible_length",
  MalformedLength = "malformed_length",
  MalformedHeader = "malformed_header",
  UnsupportedVersion = "unsupported_version",
  MalformedAbstractSyntax = "malformed_abstract_syntax",
  MalformedConcreteSyntax = "malformed_concrete_syntax",
  UnknownLanguage = "unknown_language",
  UnknownCategory = "unknown_category",
  UnknownFunction = "unknown_function",
  MissingLinearization = "missing_linearization",
  InvalidTree = "invalid_tree",
}

export class PgfError extends Error {
  readonly code: PgfErrorCode;

  constructor(code: PgfErrorCode, message: string) {
    super(message);
    this.name = "PgfError";
    this.code = code;
  }
}

export class PgfDecodeError extends PgfError {
  /** Byte offset within the input buffer where decoding failed. */
  readonly offset: number;

  constructor(code: PgfErrorCode, message: string, offset: number) {
    super(code, `${message} (at byte ${offset})`);
    this.name = "PgfDecodeError";
    this.offset = offset;
  }
}
