import type { RemoteConsole } from "vscode-languageserver/node";
import {
  ChangeInProgressError,
  InternalParseFailureError,
  InvalidRangeError,
  StaleVersionError,
  UnknownDocumentError,
  describeError,
} from "./errors";
import { getParser, treesEquivalent, type SyntaxParser, type Tree } from "./parser";
import {
  TextBuffer,
  type AppliedChanges,
  type ContentChange,
  type PositionEncoding,
  type TextSnapshot,
} from "./text-buffer";

/**
 * The slice of the connection console the document core logs through.
 */
export type Logger = Pick<RemoteConsole, "log" | "info" | "warn" | "error">;

/**
 * Immutable (text, tree, version) triple for one open document.
 */
export interface DocumentSnapshot {
  /** The URI of the document */
  readonly uri: string;
  /** Store version: 0 on open, +1 per successful change */
  readonly version: number;
  /** Version reported by the client, if it sent one */
  readonly clientVersion: number | null;
  /** The text the tree was parsed from */
  readonly text: TextSnapshot;
  /** Syntax tree for `text`, or null if the document could not be parsed */
  readonly tree: Tree | null;
}

export interface DocumentStoreOptions {
  logger: Logger;
  parser?: SyntaxParser;
  encoding?: PositionEncoding;
  /** Check every incremental parse against a full parse */
  verifyIncremental?: boolean;
  /** Longest stretch `changeAsync` parses before yielding to the event loop */
  timeSliceMs?: number;
}

export const DEFAULT_TIME_SLICE_MS = 10;

interface DocumentEntry {
  buffer: TextBuffer;
  current: DocumentSnapshot;
  /** Our text may differ from the client's until it sends the whole text again */
  outOfSync: boolean;
  /** Settles once every queued change has been applied or rejected */
  queue: Promise<void>;
  /** Queued changes not yet published */
  pending: number;
}

/**
 * Registry of open documents.
 *
 * Readers get immutable `DocumentSnapshot`s. A change builds the complete
 * next snapshot before publishing it with a single assignment, so a reader
 * sees either the old (text, tree) pair or the new one, never a mix.
 *
 * A document falls out of sync when a change cannot be applied or a client
 * version is skipped. From then on only a change that starts with the whole
 * text, or a re-open, is accepted.
 */
export class DocumentStore {
  private entries: Map<string, DocumentEntry> = new Map();
  private readonly logger: Logger;
  private readonly parser: SyntaxParser;
  private readonly encoding: PositionEncoding;
  private verifyIncremental: boolean;
  private timeSliceMs: number;

  constructor(options: DocumentStoreOptions) {
    this.logger = options.logger;
    this.parser = options.parser ?? getParser();
    this.encoding = options.encoding ?? "utf-16";
    this.verifyIncremental = options.verifyIncremental ?? false;
    this.timeSliceMs = options.timeSliceMs ?? DEFAULT_TIME_SLICE_MS;
  }

  get positionEncoding(): PositionEncoding {
    return this.encoding;
  }

  get size(): number {
    return this.entries.size;
  }

  setVerifyIncremental(enabled: boolean): void {
    this.verifyIncremental = enabled;
  }

  setTimeSliceMs(milliseconds: number): void {
    this.timeSliceMs = milliseconds;
  }

  /**
   * Start tracking a document. Re-opening a tracked URI replaces it.
   */
  open(uri: string, text: string, clientVersion?: number): DocumentSnapshot {
    const buffer = new TextBuffer(uri, text, this.encoding);
    const snapshot: DocumentSnapshot = Object.freeze({
      uri,
      version: buffer.version,
      clientVersion: clientVersion ?? null,
      text: buffer.snapshot,
      tree: this.fullParse(uri, text),
    });
    this.entries.set(uri, {
      buffer,
      current: snapshot,
      outOfSync: false,
      queue: Promise.resolve(),
      pending: 0,
    });
    this.logger.log(`Document opened: ${uri}`);
    return snapshot;
  }

  /**
   * Apply a change notification: text first, then an incremental reparse with
   * the same edits, then an atomic swap of the snapshot.
   *
   * @throws UnknownDocumentError if the URI is not open
   * @throws StaleVersionError if `clientVersion` does not advance
   * @throws InvalidRangeError if an edit does not fit the current text, or
   *   the document is out of sync and the change does not start with the
   *   whole text; the stored snapshot is left as it was
   * @throws ChangeInProgressError if `changeAsync` work is still queued
   */
  change(uri: string, changes: readonly ContentChange[], clientVersion?: number): DocumentSnapshot {
    const entry = this.entry(uri);
    if (entry.pending > 0) {
      throw new ChangeInProgressError(uri, entry.pending);
    }
    const previous = entry.current;
    const applied = this.applyText(uri, entry, changes, clientVersion);
    const tree = this.reparse(uri, previous.tree, applied);
    return this.publish(uri, entry, applied, clientVersion ?? previous.clientVersion, tree);
  }

  /**
   * Same as `change`, but the reparse runs in time slices so other messages
   * are handled between them. Changes to one document are applied in call
   * order; a rejected change does not hold up the ones queued after it.
   */
  changeAsync(
    uri: string,
    changes: readonly ContentChange[],
    clientVersion?: number
  ): Promise<DocumentSnapshot> {
    const entry = this.entries.get(uri);
    if (!entry) {
      return Promise.reject(new UnknownDocumentError(uri));
    }
    entry.pending += 1;
    const result = entry.queue.then(async () => {
      try {
        const previous = entry.current;
        const applied = this.applyText(uri, entry, changes, clientVersion);
        const tree = await this.reparseInSlices(uri, previous.tree, applied);
        return this.publish(uri, entry, applied, clientVersion ?? previous.clientVersion, tree);
      } finally {
        entry.pending -= 1;
      }
    });
    // The caller receives the failure through `result`.
    entry.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /**
   * Resolves once every change queued so far for `uri` has settled.
   */
  settled(uri: string): Promise<void> {
    return this.entries.get(uri)?.queue ?? Promise.resolve();
  }

  /**
   * True while the document waits for a full-text change.
   */
  isOutOfSync(uri: string): boolean {
    return this.entries.get(uri)?.outOfSync ?? false;
  }

  /**
   * Stop tracking a document. Returns false if it was not open.
   */
  close(uri: string): boolean {
    const removed = this.entries.delete(uri);
    if (removed) {
      this.logger.log(`Document closed: ${uri}`);
    }
    return removed;
  }

  /**
   * Current snapshot of a document.
   *
   * @throws UnknownDocumentError if the URI is not open
   */
  snapshot(uri: string): DocumentSnapshot {
    return this.entry(uri).current;
  }

  has(uri: string): boolean {
    return this.entries.has(uri);
  }

  uris(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Drop every document. Call this when the server shuts down.
   */
  clear(): void {
    this.entries.clear();
  }

  private entry(uri: string): DocumentEntry {
    const entry = this.entries.get(uri);
    if (!entry) {
      throw new UnknownDocumentError(uri);
    }
    return entry;
  }

  /**
   * Version checks and the text update. On success the buffer holds the new
   * text and the document is back in sync.
   */
  private applyText(
    uri: string,
    entry: DocumentEntry,
    changes: readonly ContentChange[],
    clientVersion: number | undefined
  ): AppliedChanges {
    const known = entry.current.clientVersion;
    if (clientVersion !== undefined && known !== null) {
      if (clientVersion <= known) {
        throw new StaleVersionError(uri, known, clientVersion);
      }
      if (clientVersion !== known + 1) {
        this.markOutOfSync(uri, entry, `expected version ${known + 1}, received ${clientVersion}`);
      }
    }

    const first = changes[0];
    if (entry.outOfSync && (first === undefined || "range" in first)) {
      throw new InvalidRangeError(`${uri} is out of sync; only a full-text change can resynchronize it`);
    }

    let applied: AppliedChanges;
    try {
      applied = entry.buffer.apply(changes);
    } catch (error) {
      if (error instanceof InvalidRangeError) {
        this.markOutOfSync(uri, entry, error.message);
      }
      throw error;
    }
    entry.outOfSync = false;
    return applied;
  }

  private markOutOfSync(uri: string, entry: DocumentEntry, reason: string): void {
    if (entry.outOfSync) {
      return;
    }
    entry.outOfSync = true;
    this.logger.warn(`${uri} is out of sync: ${reason}. Waiting for a full-text change.`);
  }

  private publish(
    uri: string,
    entry: DocumentEntry,
    applied: AppliedChanges,
    clientVersion: number | null,
    tree: Tree | null
  ): DocumentSnapshot {
    const next: DocumentSnapshot = Object.freeze({
      uri,
      version: applied.snapshot.version,
      clientVersion,
      text: applied.snapshot,
      tree,
    });
    entry.current = next;
    this.logger.log(`Document changed: ${uri} (version ${next.version})`);
    return next;
  }

  private reparse(uri: string, previous: Tree | null, applied: AppliedChanges): Tree | null {
    const text = applied.snapshot.getText();
    if (previous) {
      try {
        return this.checked(uri, this.parser.reparse(previous, applied.edits, text), text);
      } catch (error) {
        this.incrementalFailed(uri, error);
      }
    }
    return this.fullParse(uri, text);
  }

  private async reparseInSlices(
    uri: string,
    previous: Tree | null,
    applied: AppliedChanges
  ): Promise<Tree | null> {
    const text = applied.snapshot.getText();
    if (previous) {
      try {
        const tree = await this.parser.reparseInSlices(previous, applied.edits, text, this.timeSliceMs);
        return this.checked(uri, tree, text);
      } catch (error) {
        this.incrementalFailed(uri, error);
      }
    }
    return this.fullParse(uri, text);
  }

  private incrementalFailed(uri: string, error: unknown): void {
    if (!(error instanceof InternalParseFailureError)) {
      throw error;
    }
    this.logger.error(`Incremental parse failed for ${uri}: ${error.message}. Retrying with a full parse.`);
  }

  private checked(uri: string, incremental: Tree, text: string): Tree {
    if (!this.verifyIncremental) {
      return incremental;
    }
    const full = this.parser.parse(text);
    if (treesEquivalent(incremental, full)) {
      return incremental;
    }
    this.logger.warn(`Incremental parse of ${uri} diverged from a full parse; using the full parse`);
    return full;
  }

  private fullParse(uri: string, text: string): Tree | null {
    try {
      return this.parser.parse(text);
    } catch (error) {
      if (!(error instanceof InternalParseFailureError)) {
        throw error;
      }
      this.logger.error(`Parse failed for ${uri}: ${describeError(error)}. Document marked unparsed.`);
      return null;
    }
  }
}
