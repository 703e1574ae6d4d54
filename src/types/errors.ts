export type ParseErrorCode = "MissingBoxBounds" | "MissingAtomsSection" | "NoAtomsParsed";
export type AssignmentErrorCode =
  | "NoActiveGroup"
  | "DuplicateGroup"
  | "InvalidGroupId"
  | "UnknownGroup"
  | "IndexOutOfRange";
export type SessionErrorCode = "NoDataset" | "NoProjectPath" | "NoLineSelection";
export type ExpressionErrorCode =
  | "SyntaxError"
  | "UnknownAtomId"
  | "NonNumericResult"
  | "InsufficientComponents";

/** Base class for every error the editor core raises on purpose. */
export abstract class EditorError<C extends string = string> extends Error {
  abstract readonly family: string;

  constructor(
    readonly code: C,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Data file could not be turned into a dataset. */
export class ParseError extends EditorError<ParseErrorCode> {
  readonly family = "parse";
}

/** A group mutation was refused; nothing changed. */
export class AssignmentError extends EditorError<AssignmentErrorCode> {
  readonly family = "assignment";
}

/** An editor action needs session state that is not there yet. */
export class SessionError extends EditorError<SessionErrorCode> {
  readonly family = "session";
}

export class ExpressionError extends EditorError<ExpressionErrorCode> {
  readonly family = "expression";

  constructor(
    code: ExpressionErrorCode,
    message: string,
    /** Character offset in the expression, when known. */
    readonly position?: number,
  ) {
    super(code, message);
  }
}

/** Project document is malformed or lacks a required field. */
export class SerializationError extends EditorError<"InvalidDocument"> {
  readonly family = "serialization";

  constructor(
    message: string,
    /** Dotted path of the offending field, e.g. `data.box.xlo`. */
    readonly field?: string,
  ) {
    super("InvalidDocument", field ? `${field}: ${message}` : message);
  }
}

export function isEditorError(value: unknown): value is EditorError {
  return value instanceof EditorError;
}

/** Message suitable for a status bar or dialog. */
export function describeError(value: unknown): string {
  if (isEditorError(value)) return `${value.code}: ${value.message}`;
  if (value instanceof Error) return value.message;
  return String(value);
}
