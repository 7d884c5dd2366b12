import type { Position } from "vscode-languageserver/node";

/**
 * Discriminant shared by every error the document core raises.
 */
export type DocumentErrorCode =
  | "UnknownDocument"
  | "InvalidRange"
  | "StaleVersion"
  | "ChangeInProgress"
  | "InternalParseFailure";

/**
 * Base class for recoverable document errors.
 *
 * The server layer switches on `code` to decide how to degrade: unknown
 * documents produce empty results, invalid ranges and stale versions leave the
 * stored snapshot untouched, parse failures are logged by the store itself.
 */
export abstract class DocumentError extends Error {
  abstract readonly code: DocumentErrorCode;
}

/**
 * An operation referenced a URI that is not currently open.
 */
export class UnknownDocumentError extends DocumentError {
  readonly code = "UnknownDocument" as const;

  constructor(readonly uri: string) {
    super(`Unknown document: ${uri}`);
    this.name = "UnknownDocumentError";
  }
}

/**
 * An edit range falls outside the buffer, ends before it starts, or splits a
 * multi-unit character.
 */
export class InvalidRangeError extends DocumentError {
  readonly code = "InvalidRange" as const;

  constructor(
    message: string,
    readonly position: Position | null = null
  ) {
    super(message);
    this.name = "InvalidRangeError";
  }
}

/**
 * A change notification carried a client version that does not advance past
 * the one already applied.
 */
export class StaleVersionError extends DocumentError {
  readonly code = "StaleVersion" as const;

  constructor(
    readonly uri: string,
    readonly currentVersion: number,
    readonly receivedVersion: number
  ) {
    super(
      `Stale change for ${uri}: received version ${receivedVersion}, already at ${currentVersion}`
    );
    this.name = "StaleVersionError";
  }
}

/**
 * A synchronous change arrived while queued changes to the same document were
 * still being parsed.
 */
export class ChangeInProgressError extends DocumentError {
  readonly code = "ChangeInProgress" as const;

  constructor(
    readonly uri: string,
    readonly pending: number
  ) {
    super(`Cannot change ${uri} while ${pending} queued change(s) are in progress`);
    this.name = "ChangeInProgressError";
  }
}

/**
 * The parser produced no usable tree. Treated as a defect, never shown to users.
 */
export class InternalParseFailureError extends DocumentError {
  readonly code = "InternalParseFailure" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InternalParseFailureError";
  }
}

/**
 * Render an unknown thrown value for a log line.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
