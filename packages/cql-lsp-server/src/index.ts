export { createServer, negotiatePositionEncoding, COMPLETION_TRIGGER_CHARACTERS, type CqlServer } from "./server";
export { DocumentStore, type DocumentSnapshot, type DocumentStoreOptions, type Logger } from "./documents";
export {
  TextBuffer,
  TextSnapshot,
  SUPPORTED_POSITION_ENCODINGS,
  type ContentChange,
  type EditOperation,
  type FullTextChange,
  type OffsetEdit,
  type PositionEncoding,
} from "./text-buffer";
export { IncrementalParser, CQLDialect, getParser, parseDocument, treesEquivalent, type SyntaxParser } from "./parser";
export {
  resolveContext,
  resolveContextAt,
  type ClauseContextTag,
  type GrammaticalContext,
  type StatementKind,
  type TokenBoundary,
} from "./cursor-context";
export { complete, getCompletions, toCompletionItem, type CompletionOptions } from "./completion";
export { CompletionCatalog, getCatalog, type CompletionCandidate } from "./completion-catalog";
export { DEFAULT_SETTINGS, parseSettings, type ServerSettings } from "./config";
export {
  ChangeInProgressError,
  DocumentError,
  InternalParseFailureError,
  InvalidRangeError,
  StaleVersionError,
  UnknownDocumentError,
  type DocumentErrorCode,
} from "./errors";
