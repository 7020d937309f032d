export type ParseErrorCode = "EmptyLine" | "MissingCommand" | "MalformedTags";

export type SerializeErrorCode =
  | "InvalidCommand"
  | "InvalidParameter"
  | "TooManyParameters"
  | "InvalidTagKey"
  | "InvalidSource";

export class ParseError extends Error {
  readonly code: ParseErrorCode;
  readonly line: string;

  constructor(code: ParseErrorCode, message: string, line: string) {
    super(message);
    this.name = "ParseError";
    this.code = code;
    this.line = line;
  }
}

export class SerializeError extends Error {
  readonly code: SerializeErrorCode;

  constructor(code: SerializeErrorCode, message: string) {
    super(message);
    this.name = "SerializeError";
    this.code = code;
  }
}
