/**
 * Completion support for the CQL language server.
 *
 * @module completion
 *
 * ## Flow
 *
 * ```
 * LSP completion request
 *   → DocumentStore.snapshot(uri)
 *   → resolveContext(snapshot, position)     (cursor-context.ts)
 *   → complete(context)                      (table lookup)
 *   → toCompletionItem(candidate, index)
 * ```
 *
 * `complete` is a pure function of the grammatical context. The candidate list
 * for every context tag is resolved against the catalog and sorted once, when
 * the module loads, so a request never sorts or allocates candidates.
 */

import {
  CompletionItemKind,
  CompletionItemTag,
  InsertTextFormat,
  MarkupKind,
} from "vscode-languageserver/node";
import type { CompletionItem, Position } from "vscode-languageserver/node";
import { getCatalog, type CatalogItemKind, type CompletionCandidate } from "./completion-catalog";
import {
  CLAUSE_CONTEXT_TAGS,
  resolveContext,
  type ClauseContextTag,
  type GrammaticalContext,
} from "./cursor-context";
import type { DocumentStore } from "./documents";

// ============================================================================
// Candidate table
// ============================================================================

const STATEMENT_START = [
  "select",
  "insert",
  "update",
  "delete",
  "create-keyspace",
  "create-table",
  "create-type",
  "create-index",
  "create-materialized-view",
  "create-function",
  "create-aggregate",
  "create-role",
  "create-user",
  "alter-table",
  "alter-keyspace",
  "alter-type",
  "alter-role",
  "drop-table",
  "drop-keyspace",
  "drop-type",
  "drop-index",
  "use",
  "truncate",
  "begin-batch",
  "grant",
  "revoke",
  "list-roles",
  "snippet-create-table",
  "snippet-insert",
  "snippet-create-keyspace",
];

const COLUMN_TYPES = [
  "type-ascii",
  "type-bigint",
  "type-blob",
  "type-boolean",
  "type-counter",
  "type-date",
  "type-decimal",
  "type-double",
  "type-duration",
  "type-float",
  "type-inet",
  "type-int",
  "type-smallint",
  "type-text",
  "type-time",
  "type-timestamp",
  "type-timeuuid",
  "type-tinyint",
  "type-uuid",
  "type-varchar",
  "type-varint",
  "type-list",
  "type-set",
  "type-map",
  "type-tuple",
  "type-frozen",
];

const TABLE_PROPERTIES = [
  "prop-clustering-order",
  "prop-comment",
  "prop-compaction",
  "prop-compression",
  "prop-caching",
  "prop-default-ttl",
  "prop-gc-grace-seconds",
  "prop-bloom-filter",
  "prop-speculative-retry",
  "prop-memtable-flush",
];

const SELECT_TAIL = ["group-by", "order-by", "per-partition-limit", "limit", "allow-filtering"];

const CANDIDATE_TABLE = {
  selectColumns: ["star", "distinct", "json", "count", "writetime", "ttl-function", "token"],
  selectJsonColumns: ["star", "distinct", "count", "writetime", "ttl-function", "token"],
  selectSelectors: ["as", "from"],
  selectFilters: ["where", ...SELECT_TAIL],
  selectConditions: ["and", ...SELECT_TAIL],
  selectGrouping: ["order-by", "per-partition-limit", "limit", "allow-filtering"],
  selectOrdering: ["asc", "desc", "limit", "allow-filtering"],
  selectTail: ["limit", "allow-filtering"],
  selectLimit: ["allow-filtering"],
  insertInto: ["into"],
  insertSource: ["values", "json"],
  insertOptions: ["if-not-exists", "using-ttl", "using-timestamp"],
  insertUsing: ["using-ttl", "using-timestamp"],
  usingOption: ["ttl", "timestamp"],
  usingContinuation: ["and"],
  updateTarget: ["using-ttl", "using-timestamp", "set"],
  updateUsing: ["and", "set"],
  updateAssignments: ["where"],
  mutationConditions: ["and", "if", "if-exists"],
  conditionContinuation: ["and"],
  deleteFrom: ["from"],
  deleteTarget: ["using-timestamp", "where"],
  deleteUsingOption: ["timestamp"],
  deleteUsing: ["where"],
  createObjectKind: [
    "kind-keyspace",
    "kind-table",
    "kind-type",
    "kind-index",
    "kind-custom-index",
    "kind-materialized-view",
    "kind-function",
    "kind-aggregate",
    "kind-role",
    "kind-user",
    "kind-trigger",
    "kind-or-replace",
  ],
  createReplaceableKind: ["kind-function", "kind-aggregate"],
  createCustomKind: ["kind-index"],
  alterObjectKind: [
    "kind-keyspace",
    "kind-table",
    "kind-type",
    "kind-materialized-view",
    "kind-role",
    "kind-user",
  ],
  dropObjectKind: [
    "kind-keyspace",
    "kind-table",
    "kind-type",
    "kind-index",
    "kind-materialized-view",
    "kind-function",
    "kind-aggregate",
    "kind-role",
    "kind-user",
    "kind-trigger",
  ],
  createName: ["if-not-exists"],
  dropName: ["if-exists"],
  tableOptions: ["with"],
  tableColumnStart: ["primary-key-definition"],
  columnType: COLUMN_TYPES,
  columnConstraint: ["primary-key", "static"],
  tableProperty: TABLE_PROPERTIES,
  propertyContinuation: ["and"],
  keyspaceOptions: ["with"],
  keyspaceProperty: ["prop-replication", "prop-durable-writes"],
  indexTarget: ["on"],
  indexOptions: ["using-index-class"],
  alterTableAction: ["add", "drop-column", "rename", "with"],
  truncateTarget: ["kind-table"],
  batchKind: ["batch", "unlogged-batch", "counter-batch"],
  batchKeyword: ["batch"],
  batchBody: ["insert", "update", "delete", "apply-batch"],
  applyBatch: ["batch"],
  freeform: [],
} satisfies Record<ClauseContextTag, readonly string[]>;

const catalog = getCatalog();

const STATEMENT_START_CANDIDATES = catalog.resolve(STATEMENT_START);

const CLAUSE_CANDIDATES: ReadonlyMap<ClauseContextTag, readonly CompletionCandidate[]> = new Map(
  CLAUSE_CONTEXT_TAGS.map((tag) => [tag, catalog.resolve(CANDIDATE_TABLE[tag])] as const)
);

// ============================================================================
// Engine
// ============================================================================

/**
 * Ordered candidates for a grammatical context. Identical contexts always
 * return the same list.
 */
export function complete(context: GrammaticalContext): readonly CompletionCandidate[] {
  switch (context.kind) {
    case "statementStart":
      return STATEMENT_START_CANDIDATES;
    case "suppressed":
      return [];
    case "clause":
      return CLAUSE_CANDIDATES.get(context.tag) ?? [];
  }
}

const ITEM_KINDS: Record<CatalogItemKind, CompletionItemKind> = {
  keyword: CompletionItemKind.Keyword,
  snippet: CompletionItemKind.Snippet,
  type: CompletionItemKind.TypeParameter,
  function: CompletionItemKind.Function,
  property: CompletionItemKind.Property,
  operator: CompletionItemKind.Operator,
};

/**
 * Convert a candidate into an LSP completion item. `index` is the candidate's
 * position in its list and keeps the client from re-sorting by label.
 */
export function toCompletionItem(candidate: CompletionCandidate, index: number): CompletionItem {
  const item: CompletionItem = {
    label: candidate.label,
    kind: ITEM_KINDS[candidate.kind],
    sortText: String(index).padStart(4, "0"),
    insertText: candidate.insertText,
    insertTextFormat: candidate.format === "snippet" ? InsertTextFormat.Snippet : InsertTextFormat.PlainText,
    documentation: {
      kind: MarkupKind.Markdown,
      value: candidate.documentation,
    },
  };
  if (candidate.detail) {
    item.detail = candidate.detail;
  }
  if (candidate.deprecated) {
    item.tags = [CompletionItemTag.Deprecated];
  }
  return item;
}

export interface CompletionOptions {
  /** Offer deprecated items, tagged as such */
  includeDeprecated: boolean;
  /** Offer snippet-format items */
  snippets: boolean;
}

/**
 * Completion items for `position` in the document at `uri`. Documents that
 * are not open, or whose text is out of sync with the client, yield no items.
 */
export function getCompletions(
  store: DocumentStore,
  uri: string,
  position: Position,
  options: CompletionOptions
): CompletionItem[] {
  if (!store.has(uri) || store.isOutOfSync(uri)) {
    return [];
  }
  const context = resolveContext(store.snapshot(uri), position);
  return complete(context)
    .filter((candidate) => options.includeDeprecated || !candidate.deprecated)
    .filter((candidate) => options.snippets || candidate.format !== "snippet")
    .map(toCompletionItem);
}
