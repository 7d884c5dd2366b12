import { TextDocument } from "vscode-languageserver-textdocument";
import type { Position, Range } from "vscode-languageserver/node";
import { InvalidRangeError } from "./errors";

/**
 * Language identifier attached to every buffer.
 */
export const LANGUAGE_ID = "cql";

/**
 * Unit in which a position's `character` is counted.
 * Values match the LSP `PositionEncodingKind` strings.
 */
export type PositionEncoding = "utf-8" | "utf-16" | "utf-32";

export const SUPPORTED_POSITION_ENCODINGS: readonly PositionEncoding[] = ["utf-16", "utf-8", "utf-32"];

export function isPositionEncoding(value: string): value is PositionEncoding {
  return SUPPORTED_POSITION_ENCODINGS.some((encoding) => encoding === value);
}

/**
 * Replace the half-open `range` with `text`.
 */
export interface EditOperation {
  range: Range;
  text: string;
}

/**
 * Replace the whole buffer with `text`.
 */
export interface FullTextChange {
  text: string;
}

/**
 * One entry of a change notification. Structurally compatible with the LSP
 * `TextDocumentContentChangeEvent`.
 */
export type ContentChange = EditOperation | FullTextChange;

/**
 * An edit expressed in UTF-16 offsets of the text it was applied to.
 */
export interface OffsetEdit {
  readonly from: number;
  readonly to: number;
  readonly insert: string;
}

/**
 * Result of a successful `TextBuffer.apply`.
 */
export interface AppliedChanges {
  readonly snapshot: TextSnapshot;
  /** Offset edits in application order, each relative to its predecessor's output */
  readonly edits: readonly OffsetEdit[];
}

// ============================================================================
// Encoding
// ============================================================================

function encodedSize(codePoint: number, encoding: PositionEncoding): number {
  switch (encoding) {
    case "utf-16":
      return codePoint > 0xffff ? 2 : 1;
    case "utf-32":
      return 1;
    case "utf-8":
      if (codePoint < 0x80) return 1;
      if (codePoint < 0x800) return 2;
      if (codePoint < 0x10000) return 3;
      return 4;
  }
}

/**
 * Convert an encoded column on `lineText` to a UTF-16 column.
 *
 * Returns null when the column lies past the end of the line or inside a
 * character, unless `clamp` is set, in which case the nearest preceding
 * character boundary is returned.
 */
function toUtf16Column(
  lineText: string,
  character: number,
  encoding: PositionEncoding,
  clamp: boolean
): number | null {
  let units = 0;
  let column = 0;
  while (units < character) {
    const codePoint = lineText.codePointAt(column);
    if (codePoint === undefined) {
      return clamp ? column : null;
    }
    const size = encodedSize(codePoint, encoding);
    if (units + size > character) {
      return clamp ? column : null;
    }
    units += size;
    column += codePoint > 0xffff ? 2 : 1;
  }
  return column;
}

function fromUtf16Column(lineText: string, column: number, encoding: PositionEncoding): number {
  if (encoding === "utf-16") {
    return column;
  }
  let units = 0;
  let index = 0;
  while (index < column) {
    const codePoint = lineText.codePointAt(index);
    if (codePoint === undefined) {
      break;
    }
    units += encodedSize(codePoint, encoding);
    index += codePoint > 0xffff ? 2 : 1;
  }
  return units;
}

function getLineText(document: TextDocument, line: number): string {
  const text = document.getText({
    start: { line, character: 0 },
    end: { line: line + 1, character: 0 },
  });
  return text.replace(/(\r\n|\r|\n)$/, "");
}

function formatPosition(position: Position): string {
  return `${position.line}:${position.character}`;
}

/**
 * Translate an encoded position into a UTF-16 offset of `document`.
 * Throws `InvalidRangeError` when the position is out of bounds.
 */
function strictOffsetAt(document: TextDocument, position: Position, encoding: PositionEncoding): number {
  const { line, character } = position;
  if (!Number.isInteger(line) || !Number.isInteger(character) || line < 0 || character < 0) {
    throw new InvalidRangeError(`position ${formatPosition(position)} is invalid`, position);
  }
  if (line >= document.lineCount) {
    throw new InvalidRangeError(`position ${formatPosition(position)} is out of bounds`, position);
  }
  const column = toUtf16Column(getLineText(document, line), character, encoding, false);
  if (column === null) {
    throw new InvalidRangeError(`position ${formatPosition(position)} is out of bounds`, position);
  }
  return document.offsetAt({ line, character: column });
}

// ============================================================================
// Snapshot
// ============================================================================

/**
 * Immutable view of a buffer's text at one version.
 *
 * The wrapped `TextDocument` is never updated after the snapshot is created,
 * so a snapshot can be handed to readers while the buffer moves on.
 */
export class TextSnapshot {
  constructor(
    private readonly document: TextDocument,
    readonly encoding: PositionEncoding
  ) {}

  get uri(): string {
    return this.document.uri;
  }

  get version(): number {
    return this.document.version;
  }

  get length(): number {
    return this.document.getText().length;
  }

  get lineCount(): number {
    return this.document.lineCount;
  }

  getText(): string {
    return this.document.getText();
  }

  /**
   * Text of `line` without its line terminator.
   */
  getLineText(line: number): string {
    return getLineText(this.document, line);
  }

  /**
   * Offset of `position`; throws `InvalidRangeError` if it is out of bounds.
   */
  offsetAt(position: Position): number {
    return strictOffsetAt(this.document, position, this.encoding);
  }

  /**
   * Offset of `position`, clamped into the document. Never throws.
   */
  clampedOffsetAt(position: Position): number {
    const line = Math.min(Math.max(0, Math.trunc(position.line)), this.document.lineCount - 1);
    const character = Math.max(0, Math.trunc(position.character));
    const column = toUtf16Column(this.getLineText(line), character, this.encoding, true) ?? 0;
    return this.document.offsetAt({ line, character: column });
  }

  /**
   * Encoded position of a UTF-16 offset.
   */
  positionAt(offset: number): Position {
    const position = this.document.positionAt(offset);
    return {
      line: position.line,
      character: fromUtf16Column(this.getLineText(position.line), position.character, this.encoding),
    };
  }
}

// ============================================================================
// Buffer
// ============================================================================

/**
 * Mutable text buffer holding the current snapshot of one document.
 *
 * Every successful `apply` publishes a new `TextSnapshot` with the version
 * advanced by exactly one, however many edits the call carried.
 */
export class TextBuffer {
  private current: TextSnapshot;

  constructor(uri: string, text: string, encoding: PositionEncoding = "utf-16") {
    this.current = new TextSnapshot(TextDocument.create(uri, LANGUAGE_ID, 0, text), encoding);
  }

  get snapshot(): TextSnapshot {
    return this.current;
  }

  get version(): number {
    return this.current.version;
  }

  /**
   * Apply `changes` in order, each against the text its predecessors produced.
   *
   * All or nothing: if any change has an invalid range an `InvalidRangeError`
   * is thrown and the buffer keeps its previous snapshot.
   */
  apply(changes: readonly ContentChange[]): AppliedChanges {
    const { encoding } = this.current;
    const nextVersion = this.current.version + 1;
    const working = TextDocument.create(this.current.uri, LANGUAGE_ID, nextVersion, this.current.getText());
    const edits: OffsetEdit[] = [];

    for (const change of changes) {
      if ("range" in change) {
        const from = strictOffsetAt(working, change.range.start, encoding);
        const to = strictOffsetAt(working, change.range.end, encoding);
        if (to < from) {
          throw new InvalidRangeError(
            `range ${formatPosition(change.range.start)}-${formatPosition(change.range.end)} ends before it starts`,
            change.range.end
          );
        }
        // Positions handed to update() are UTF-16 whatever the buffer encoding
        const range = { start: working.positionAt(from), end: working.positionAt(to) };
        TextDocument.update(working, [{ range, text: change.text }], nextVersion);
        edits.push({ from, to, insert: change.text });
      } else {
        const to = working.getText().length;
        TextDocument.update(working, [{ text: change.text }], nextVersion);
        edits.push({ from: 0, to, insert: change.text });
      }
    }

    this.current = new TextSnapshot(working, encoding);
    return { snapshot: this.current, edits };
  }

  /**
   * Replace the whole buffer. Versions exactly like `apply`.
   */
  replaceAll(text: string): AppliedChanges {
    return this.apply([{ text }]);
  }
}
