/**
 * Cursor context resolution for CQL documents.
 *
 * Turns a cursor position into a symbolic grammatical context that the
 * completion engine can look up without touching the syntax tree.
 *
 * @module cursor-context
 *
 * ## Resolution
 *
 * 1. Descend from the root to the deepest node containing the offset. When one
 *    child ends at the offset and the next one starts there, the one ending at
 *    the offset wins, so `CREATE |` still sees the `CREATE` token.
 * 2. A cursor inside a comment, string, quoted identifier or numeric literal is
 *    `suppressed`.
 * 3. The tokens of the current statement that end before the cursor are
 *    flattened into items, with closed parenthesised groups collapsed into a
 *    single item. The statement kind comes from the leading words, the clause
 *    from the last clause keyword, and the boundary from what follows it.
 * 4. `(statement, clause, boundary)` is looked up in a static table. Anything
 *    the table does not list is `freeform`: a name or expression is expected
 *    and no keyword applies.
 */

import type { Position } from "vscode-languageserver/node";
import type { DocumentSnapshot } from "./documents";
import type { SyntaxNode, Tree } from "./parser";

// ============================================================================
// Types
// ============================================================================

export type StatementKind =
  | "select"
  | "insert"
  | "update"
  | "delete"
  | "create"
  | "createKeyspace"
  | "createTable"
  | "createType"
  | "createIndex"
  | "createObject"
  | "alter"
  | "alterTable"
  | "alterKeyspace"
  | "alterObject"
  | "drop"
  | "dropObject"
  | "use"
  | "truncate"
  | "batch"
  | "apply"
  | "other";

export type SuppressionReason = "comment" | "string" | "quotedIdentifier" | "literal";

/**
 * What sits between the nearest clause keyword and the cursor.
 *
 * - `keyword`: nothing, the cursor directly follows the clause keyword
 * - `separator`: a comma, `AND` or `OR`
 * - `operator`: an operator such as `=` or `.`
 * - `operand`: exactly one name, value or group since the last separator
 * - `operands`: more than one
 */
export type TokenBoundary = "keyword" | "separator" | "operator" | "operand" | "operands";

export const CLAUSE_CONTEXT_TAGS = [
  "selectColumns",
  "selectJsonColumns",
  "selectSelectors",
  "selectFilters",
  "selectConditions",
  "selectGrouping",
  "selectOrdering",
  "selectTail",
  "selectLimit",
  "insertInto",
  "insertSource",
  "insertOptions",
  "insertUsing",
  "usingOption",
  "usingContinuation",
  "updateTarget",
  "updateUsing",
  "updateAssignments",
  "mutationConditions",
  "conditionContinuation",
  "deleteFrom",
  "deleteTarget",
  "deleteUsingOption",
  "deleteUsing",
  "createObjectKind",
  "createReplaceableKind",
  "createCustomKind",
  "alterObjectKind",
  "dropObjectKind",
  "createName",
  "dropName",
  "tableOptions",
  "tableColumnStart",
  "columnType",
  "columnConstraint",
  "tableProperty",
  "propertyContinuation",
  "keyspaceOptions",
  "keyspaceProperty",
  "indexTarget",
  "indexOptions",
  "alterTableAction",
  "truncateTarget",
  "batchKind",
  "batchKeyword",
  "batchBody",
  "applyBatch",
  "freeform",
] as const;

export type ClauseContextTag = (typeof CLAUSE_CONTEXT_TAGS)[number];

export type GrammaticalContext =
  | { kind: "statementStart" }
  | { kind: "suppressed"; reason: SuppressionReason }
  | {
      kind: "clause";
      tag: ClauseContextTag;
      statement: StatementKind;
      /** Nearest clause keyword, upper case; `columnList` inside a column definition list */
      clause: string;
      boundary: TokenBoundary;
    };

/**
 * One level of the descent from the root to the cursor.
 */
export interface NodeFrame {
  readonly name: string;
  readonly from: number;
  readonly to: number;
  readonly node: SyntaxNode;
}

type TokenKind = "word" | "value" | "open" | "close" | "comma" | "semicolon" | "operator";

interface Token {
  readonly kind: TokenKind;
  readonly text: string;
}

type Item =
  | { readonly kind: "word"; readonly word: string }
  | { readonly kind: "value" }
  | { readonly kind: "operator"; readonly text: string }
  | { readonly kind: "comma" }
  | { readonly kind: "group"; readonly index: number };

interface OpenGroup {
  /** Position of the group among the statement's top-level groups */
  readonly index: number;
  readonly inner: readonly Token[];
}

interface GroupedTokens {
  readonly items: readonly Item[];
  readonly open: OpenGroup | null;
}

// ============================================================================
// Constants
// ============================================================================

const COMMENT_NODES = new Set(["LineComment", "BlockComment"]);

const SUPPRESSING_NODES = new Map<string, SuppressionReason>([
  ["LineComment", "comment"],
  ["BlockComment", "comment"],
  ["String", "string"],
  ["QuotedIdentifier", "quotedIdentifier"],
  ["Number", "literal"],
  ["Bits", "literal"],
  ["Bytes", "literal"],
]);

const VALUE_NODES = new Set([
  "String",
  "Number",
  "Bool",
  "Null",
  "Bits",
  "Bytes",
  "QuotedIdentifier",
  "SpecialVar",
]);

const WORD_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** How many earlier statements to inspect when looking for an open batch */
const MAX_BATCH_LOOKBACK = 256;

const SIMPLE_STATEMENTS = new Map<string, StatementKind>([
  ["SELECT", "select"],
  ["INSERT", "insert"],
  ["UPDATE", "update"],
  ["DELETE", "delete"],
  ["USE", "use"],
  ["TRUNCATE", "truncate"],
  ["APPLY", "apply"],
]);

const CREATE_KINDS = new Map<string, StatementKind>([
  ["TABLE", "createTable"],
  ["COLUMNFAMILY", "createTable"],
  ["KEYSPACE", "createKeyspace"],
  ["SCHEMA", "createKeyspace"],
  ["TYPE", "createType"],
  ["INDEX", "createIndex"],
]);

const ALTER_KINDS = new Map<string, StatementKind>([
  ["TABLE", "alterTable"],
  ["COLUMNFAMILY", "alterTable"],
  ["KEYSPACE", "alterKeyspace"],
  ["SCHEMA", "alterKeyspace"],
]);

const OBJECT_KIND_WORDS = new Set([
  "KEYSPACE",
  "SCHEMA",
  "TABLE",
  "COLUMNFAMILY",
  "TYPE",
  "INDEX",
  "FUNCTION",
  "AGGREGATE",
  "ROLE",
  "USER",
  "TRIGGER",
  "VIEW",
]);

const CLAUSE_MARKERS = new Map<StatementKind, readonly string[]>([
  [
    "select",
    [
      "DISTINCT",
      "JSON",
      "AS",
      "FROM",
      "WHERE",
      "GROUP BY",
      "ORDER BY",
      "PER PARTITION LIMIT",
      "LIMIT",
      "ALLOW FILTERING",
    ],
  ],
  ["insert", ["INTO", "JSON", "VALUES", "IF NOT EXISTS", "USING"]],
  ["update", ["USING", "SET", "WHERE", "IF EXISTS", "IF"]],
  ["delete", ["FROM", "USING", "WHERE", "IF EXISTS", "IF"]],
  ["createTable", ["IF NOT EXISTS", "WITH", "CLUSTERING ORDER BY"]],
  ["createKeyspace", ["IF NOT EXISTS", "WITH"]],
  ["createType", ["IF NOT EXISTS"]],
  ["createIndex", ["IF NOT EXISTS", "ON", "USING"]],
  ["createObject", ["IF NOT EXISTS"]],
  ["alterTable", ["ADD", "DROP", "RENAME", "WITH"]],
  ["alterKeyspace", ["WITH"]],
  ["dropObject", ["IF EXISTS"]],
  ["batch", ["UNLOGGED", "COUNTER", "BATCH"]],
]);

/** Marker words per statement, longest first so `PER PARTITION LIMIT` beats `LIMIT` */
const COMPILED_MARKERS = new Map<StatementKind, readonly (readonly string[])[]>(
  [...CLAUSE_MARKERS].map(
    ([statement, markers]) =>
      [statement, markers.map((marker) => marker.split(" ")).sort((a, b) => b.length - a.length)] as const
  )
);

/** Closed groups that act as a clause of their own */
const GROUP_MARKERS: Partial<Record<StatementKind, string>> = {
  createTable: "definitions",
};

/**
 * `statement|clause|boundary` → context tag. Combinations missing here are
 * `freeform`.
 */
const RULES: Readonly<Record<string, ClauseContextTag>> = {
  // SELECT
  "select|SELECT|keyword": "selectColumns",
  "select|SELECT|operand": "selectSelectors",
  "select|SELECT|operands": "selectSelectors",
  "select|JSON|keyword": "selectJsonColumns",
  "select|DISTINCT|operand": "selectSelectors",
  "select|DISTINCT|operands": "selectSelectors",
  "select|JSON|operand": "selectSelectors",
  "select|JSON|operands": "selectSelectors",
  "select|AS|operand": "selectSelectors",
  "select|AS|operands": "selectSelectors",
  "select|FROM|operand": "selectFilters",
  "select|FROM|operands": "selectFilters",
  "select|WHERE|operands": "selectConditions",
  "select|GROUP BY|operand": "selectGrouping",
  "select|GROUP BY|operands": "selectGrouping",
  "select|ORDER BY|operand": "selectOrdering",
  "select|ORDER BY|operands": "selectTail",
  "select|PER PARTITION LIMIT|operand": "selectTail",
  "select|LIMIT|operand": "selectLimit",

  // INSERT
  "insert|INSERT|keyword": "insertInto",
  "insert|INTO|operand": "insertSource",
  "insert|INTO|operands": "insertSource",
  "insert|VALUES|operand": "insertOptions",
  "insert|JSON|operand": "insertOptions",
  "insert|IF NOT EXISTS|keyword": "insertUsing",
  "insert|USING|keyword": "usingOption",
  "insert|USING|separator": "usingOption",
  "insert|USING|operands": "usingContinuation",

  // UPDATE
  "update|UPDATE|operand": "updateTarget",
  "update|USING|keyword": "usingOption",
  "update|USING|separator": "usingOption",
  "update|USING|operands": "updateUsing",
  "update|SET|operands": "updateAssignments",
  "update|WHERE|operands": "mutationConditions",
  "update|IF|operands": "conditionContinuation",

  // DELETE
  "delete|DELETE|keyword": "deleteFrom",
  "delete|DELETE|operand": "deleteFrom",
  "delete|DELETE|operands": "deleteFrom",
  "delete|FROM|operand": "deleteTarget",
  "delete|USING|keyword": "deleteUsingOption",
  "delete|USING|operands": "deleteUsing",
  "delete|WHERE|operands": "mutationConditions",
  "delete|IF|operands": "conditionContinuation",

  // CREATE / ALTER / DROP before the object kind
  "create|CREATE|keyword": "createObjectKind",
  "create|REPLACE|keyword": "createReplaceableKind",
  "create|CUSTOM|keyword": "createCustomKind",
  "alter|ALTER|keyword": "alterObjectKind",
  "drop|DROP|keyword": "dropObjectKind",

  // Object names
  "createKeyspace|objectKind|keyword": "createName",
  "createTable|objectKind|keyword": "createName",
  "createType|objectKind|keyword": "createName",
  "createIndex|objectKind|keyword": "createName",
  "createObject|objectKind|keyword": "createName",
  "dropObject|objectKind|keyword": "dropName",

  // CREATE TABLE / CREATE TYPE
  "createTable|definitions|keyword": "tableOptions",
  "createTable|columnList|keyword": "tableColumnStart",
  "createTable|columnList|operand": "columnType",
  "createTable|columnList|operands": "columnConstraint",
  "createTable|WITH|keyword": "tableProperty",
  "createTable|WITH|separator": "tableProperty",
  "createTable|WITH|operands": "propertyContinuation",
  "createTable|CLUSTERING ORDER BY|operand": "propertyContinuation",
  "createTable|CLUSTERING ORDER BY|separator": "tableProperty",
  "createType|columnList|operand": "columnType",

  // CREATE KEYSPACE
  "createKeyspace|objectKind|operand": "keyspaceOptions",
  "createKeyspace|IF NOT EXISTS|operand": "keyspaceOptions",
  "createKeyspace|WITH|keyword": "keyspaceProperty",
  "createKeyspace|WITH|separator": "keyspaceProperty",
  "createKeyspace|WITH|operands": "propertyContinuation",

  // CREATE INDEX
  "createIndex|objectKind|operand": "indexTarget",
  "createIndex|IF NOT EXISTS|operand": "indexTarget",
  "createIndex|ON|operands": "indexOptions",

  // ALTER TABLE
  "alterTable|objectKind|operand": "alterTableAction",
  "alterTable|ADD|operand": "columnType",
  "alterTable|WITH|keyword": "tableProperty",
  "alterTable|WITH|separator": "tableProperty",
  "alterTable|WITH|operands": "propertyContinuation",

  // ALTER KEYSPACE
  "alterKeyspace|objectKind|operand": "keyspaceOptions",
  "alterKeyspace|WITH|keyword": "keyspaceProperty",
  "alterKeyspace|WITH|separator": "keyspaceProperty",
  "alterKeyspace|WITH|operands": "propertyContinuation",

  // TRUNCATE
  "truncate|TRUNCATE|keyword": "truncateTarget",

  // BATCH
  "batch|BEGIN|keyword": "batchKind",
  "batch|UNLOGGED|keyword": "batchKeyword",
  "batch|COUNTER|keyword": "batchKeyword",
  "batch|BATCH|keyword": "batchBody",
  "apply|APPLY|keyword": "applyBatch",
};

// ============================================================================
// Entry points
// ============================================================================

/**
 * Resolve the grammatical context at `position` in a stored document.
 * Never throws: positions outside the document are clamped.
 */
export function resolveContext(snapshot: DocumentSnapshot, position: Position): GrammaticalContext {
  if (!snapshot.tree || snapshot.text.length === 0) {
    return { kind: "statementStart" };
  }
  const offset = snapshot.text.clampedOffsetAt(position);
  return resolveContextAt(snapshot.tree, snapshot.text.getText(), offset);
}

/**
 * Resolve the grammatical context at a UTF-16 offset of `text`, which `tree`
 * must have been parsed from.
 */
export function resolveContextAt(tree: Tree, text: string, offset: number): GrammaticalContext {
  if (text.length === 0) {
    return { kind: "statementStart" };
  }
  const cursor = Math.min(Math.max(0, offset), text.length);
  const path = nodePathAt(tree, cursor);

  const reason = suppressionAt(path, text, cursor);
  if (reason) {
    return { kind: "suppressed", reason };
  }

  const statement = findStatement(tree, path, cursor);
  const tokens = statement ? collectTokens(statement, text, cursor) : [];
  const terminated = tokens[tokens.length - 1]?.kind === "semicolon";

  if (tokens.length === 0 || terminated) {
    // A statement start inside BEGIN BATCH ... APPLY BATCH takes batch members only
    const bound = terminated ? cursor : (statement?.from ?? cursor);
    return insideBatch(tree, text, bound) ? batchBodyContext() : { kind: "statementStart" };
  }

  return resolveTokens(tokens);
}

/**
 * Frames from the root down to the deepest node whose span holds `offset`.
 * Zero-length nodes are never entered.
 */
export function nodePathAt(tree: Tree, offset: number): NodeFrame[] {
  const path: NodeFrame[] = [toFrame(tree.topNode)];
  let node: SyntaxNode | null = childAt(tree.topNode, offset);
  while (node) {
    path.push(toFrame(node));
    node = childAt(node, offset);
  }
  return path;
}

// ============================================================================
// Tree access
// ============================================================================

function toFrame(node: SyntaxNode): NodeFrame {
  return { name: node.name, from: node.from, to: node.to, node };
}

function childAt(parent: SyntaxNode, offset: number): SyntaxNode | null {
  let starting: SyntaxNode | null = null;
  for (let child = parent.firstChild; child; child = child.nextSibling) {
    if (child.from > offset) {
      break;
    }
    if (child.from === child.to) {
      continue;
    }
    // A child ending at the offset wins over a sibling starting there
    if (child.from < offset && child.to === offset) {
      return child;
    }
    if (!starting && child.from <= offset && offset < child.to) {
      starting = child;
    }
  }
  return starting;
}

function suppressionAt(path: readonly NodeFrame[], text: string, offset: number): SuppressionReason | null {
  const deepest = path[path.length - 1];
  if (!deepest) {
    return null;
  }
  const reason = SUPPRESSING_NODES.get(deepest.name);
  if (!reason) {
    return null;
  }
  if (deepest.from < offset && offset < deepest.to) {
    return reason;
  }
  if (offset === deepest.to && isOpenEnded(deepest.name, text.slice(deepest.from, deepest.to))) {
    return reason;
  }
  return null;
}

/**
 * Whether typing at the end of the token would extend it.
 */
function isOpenEnded(name: string, token: string): boolean {
  switch (name) {
    case "LineComment":
    case "Number":
      return true;
    case "BlockComment":
      return !(token.length >= 4 && token.endsWith("*/"));
    case "String":
      if (token.startsWith("$$")) {
        return !(token.length >= 4 && token.endsWith("$$"));
      }
      return isUnclosedQuote(token);
    case "QuotedIdentifier":
    case "Bits":
    case "Bytes":
      return isUnclosedQuote(token);
    default:
      return false;
  }
}

/**
 * Quoted tokens escape their quote by doubling it: `'it''s'`.
 */
function isUnclosedQuote(token: string): boolean {
  const start = token.search(/['"`]/);
  if (start < 0) {
    return false;
  }
  const quote = token.charAt(start);
  for (let i = start + 1; i < token.length; i++) {
    if (token.charAt(i) !== quote) {
      continue;
    }
    if (token.charAt(i + 1) === quote) {
      i++;
      continue;
    }
    return i !== token.length - 1;
  }
  return true;
}

function findStatement(tree: Tree, path: readonly NodeFrame[], offset: number): SyntaxNode | null {
  for (let i = path.length - 1; i >= 0; i--) {
    const frame = path[i];
    if (frame && frame.name === "Statement") {
      return frame.node;
    }
  }
  return lastStatementBefore(tree.topNode, offset);
}

/**
 * The last top-level node ending at or before `offset`, if it is a statement.
 */
function lastStatementBefore(top: SyntaxNode, offset: number): SyntaxNode | null {
  let last: SyntaxNode | null = null;
  for (let child = top.firstChild; child && child.from < offset; child = child.nextSibling) {
    if (child.to <= offset && !COMMENT_NODES.has(child.name)) {
      last = child;
    }
  }
  return last && last.name === "Statement" ? last : null;
}

function collectLeaves(node: SyntaxNode, offset: number, leaves: SyntaxNode[]): void {
  for (let child = node.firstChild; child && child.from < offset; child = child.nextSibling) {
    if (child.from === child.to || COMMENT_NODES.has(child.name)) {
      continue;
    }
    if (child.firstChild) {
      collectLeaves(child, offset, leaves);
    } else {
      leaves.push(child);
    }
  }
}

/**
 * Tokens of `statement` that end before the cursor. A word ending exactly at
 * the cursor is the word being typed and is left out.
 */
function collectTokens(statement: SyntaxNode, text: string, offset: number): Token[] {
  const leaves: SyntaxNode[] = [];
  collectLeaves(statement, offset, leaves);

  const tokens: Token[] = [];
  for (const leaf of leaves) {
    if (leaf.to > offset) {
      break;
    }
    const token = toToken(leaf, text);
    if (leaf.to === offset && token.kind === "word") {
      break;
    }
    tokens.push(token);
  }
  return tokens;
}

function toToken(node: SyntaxNode, text: string): Token {
  const value = text.slice(node.from, node.to);
  switch (value) {
    case "(":
    case "[":
    case "{":
      return { kind: "open", text: value };
    case ")":
    case "]":
    case "}":
      return { kind: "close", text: value };
    case ";":
      return { kind: "semicolon", text: value };
    case ",":
      return { kind: "comma", text: value };
  }
  if (VALUE_NODES.has(node.name) || value === "*") {
    return { kind: "value", text: value };
  }
  if (WORD_PATTERN.test(value)) {
    return { kind: "word", text: value.toUpperCase() };
  }
  return { kind: "operator", text: value };
}

function firstWord(statement: SyntaxNode, text: string): string | null {
  let node = statement.firstChild;
  while (node) {
    if (node.from === node.to || COMMENT_NODES.has(node.name)) {
      node = node.nextSibling;
      continue;
    }
    const child = node.firstChild;
    if (!child) {
      return text.slice(node.from, node.to).toUpperCase();
    }
    node = child;
  }
  return null;
}

/**
 * Whether the most recent `BEGIN ... BATCH` before `bound` is still open.
 */
function insideBatch(tree: Tree, text: string, bound: number): boolean {
  let node = lastStatementBefore(tree.topNode, bound);
  for (let seen = 0; node && seen < MAX_BATCH_LOOKBACK; seen++) {
    if (node.name === "Statement") {
      const word = firstWord(node, text);
      if (word === "APPLY") {
        return false;
      }
      if (word === "BEGIN") {
        return true;
      }
    }
    node = node.prevSibling;
  }
  return false;
}

// ============================================================================
// Classification
// ============================================================================

function groupTokens(tokens: readonly Token[]): GroupedTokens {
  const items: Item[] = [];
  let depth = 0;
  let groups = 0;
  let inner: Token[] = [];

  for (const token of tokens) {
    if (depth > 0) {
      if (token.kind === "open") {
        depth++;
      } else if (token.kind === "close") {
        depth--;
        if (depth === 0) {
          items.push({ kind: "group", index: groups++ });
          continue;
        }
      }
      inner.push(token);
      continue;
    }

    switch (token.kind) {
      case "open":
        depth = 1;
        inner = [];
        break;
      case "word":
        items.push({ kind: "word", word: token.text });
        break;
      case "value":
        items.push({ kind: "value" });
        break;
      case "comma":
        items.push({ kind: "comma" });
        break;
      case "operator":
        items.push({ kind: "operator", text: token.text });
        break;
      case "close":
      case "semicolon":
        break;
    }
  }

  return { items, open: depth > 0 ? { index: groups, inner } : null };
}

function isWord(item: Item | undefined, word: string): boolean {
  return item?.kind === "word" && item.word === word;
}

function isSeparator(item: Item): boolean {
  return item.kind === "comma" || isWord(item, "AND") || isWord(item, "OR");
}

function countOperands(items: readonly Item[]): number {
  let count = 0;
  for (let i = items.length - 1; i >= 0; i--) {
    const item = items[i];
    if (!item || isSeparator(item)) {
      break;
    }
    if (item.kind !== "operator") {
      count++;
    }
  }
  return count;
}

function operandBoundary(count: number): TokenBoundary {
  if (count === 0) return "keyword";
  return count === 1 ? "operand" : "operands";
}

function boundaryOf(items: readonly Item[]): TokenBoundary {
  const last = items[items.length - 1];
  if (!last) {
    return "keyword";
  }
  if (isSeparator(last)) {
    return "separator";
  }
  if (last.kind === "operator") {
    return "operator";
  }
  return operandBoundary(countOperands(items));
}

function matchesAt(items: readonly Item[], index: number, words: readonly string[]): boolean {
  return words.every((word, offset) => isWord(items[index + offset], word));
}

interface StatementHead {
  readonly statement: StatementKind;
  readonly clause: string;
  /** Index of the first item after the head */
  readonly next: number;
}

function readHead(items: readonly Item[]): StatementHead {
  const first = items[0];
  if (!first || first.kind !== "word") {
    return { statement: "other", clause: "", next: 0 };
  }

  const simple = SIMPLE_STATEMENTS.get(first.word);
  if (simple) {
    return { statement: simple, clause: first.word, next: 1 };
  }

  switch (first.word) {
    case "BEGIN":
      return { statement: "batch", clause: "BEGIN", next: 1 };
    case "CREATE":
    case "ALTER":
    case "DROP":
      return readDefinitionHead(first.word, items);
    default:
      return { statement: "other", clause: first.word, next: 1 };
  }
}

function readDefinitionHead(verb: "CREATE" | "ALTER" | "DROP", items: readonly Item[]): StatementHead {
  const bare: StatementKind = verb === "CREATE" ? "create" : verb === "ALTER" ? "alter" : "drop";
  let index = 1;
  let clause: string = verb;

  if (verb === "CREATE" && matchesAt(items, index, ["OR", "REPLACE"])) {
    index += 2;
    clause = "REPLACE";
  }
  if (verb === "CREATE" && isWord(items[index], "CUSTOM")) {
    index += 1;
    clause = "CUSTOM";
  }

  const next = items[index];
  if (!next) {
    return { statement: bare, clause, next: index };
  }
  if (next.kind !== "word") {
    return { statement: "other", clause, next: index };
  }

  if (matchesAt(items, index, ["MATERIALIZED", "VIEW"])) {
    return { statement: definitionKind(verb, "VIEW"), clause: "objectKind", next: index + 2 };
  }
  if (OBJECT_KIND_WORDS.has(next.word)) {
    return { statement: definitionKind(verb, next.word), clause: "objectKind", next: index + 1 };
  }
  return { statement: "other", clause, next: index };
}

function definitionKind(verb: "CREATE" | "ALTER" | "DROP", objectKind: string): StatementKind {
  switch (verb) {
    case "CREATE":
      return CREATE_KINDS.get(objectKind) ?? "createObject";
    case "ALTER":
      return ALTER_KINDS.get(objectKind) ?? "alterObject";
    case "DROP":
      return "dropObject";
  }
}

/**
 * Drop a `BEGIN [UNLOGGED | COUNTER] BATCH` prefix when a member statement
 * follows it.
 */
function unwrapBatch(items: readonly Item[]): readonly Item[] {
  if (!isWord(items[0], "BEGIN")) {
    return items;
  }
  const batchAt = items.findIndex((item) => isWord(item, "BATCH"));
  if (batchAt < 0 || batchAt + 1 >= items.length) {
    return items;
  }
  return unwrapBatch(items.slice(batchAt + 1));
}

function clauseContext(statement: StatementKind, clause: string, boundary: TokenBoundary): GrammaticalContext {
  const tag = RULES[`${statement}|${clause}|${boundary}`] ?? "freeform";
  return { kind: "clause", tag, statement, clause, boundary };
}

function resolveTokens(tokens: readonly Token[]): GrammaticalContext {
  const grouped = groupTokens(tokens);
  const items = unwrapBatch(grouped.items);
  const head = readHead(items);

  if (grouped.open) {
    const columnList =
      grouped.open.index === 0 && (head.statement === "createTable" || head.statement === "createType");
    return resolveGroup(head.statement, grouped.open, columnList);
  }

  const markers = COMPILED_MARKERS.get(head.statement) ?? [];
  const groupMarker = GROUP_MARKERS[head.statement];
  let clause = head.clause;
  let clauseEnd = head.next;

  for (let index = head.next; index < items.length; ) {
    const item = items[index];
    if (groupMarker && item?.kind === "group" && item.index === 0) {
      clause = groupMarker;
      clauseEnd = ++index;
      continue;
    }
    const marker = markers.find((words) => matchesAt(items, index, words));
    if (marker) {
      clause = marker.join(" ");
      index += marker.length;
      clauseEnd = index;
      continue;
    }
    index++;
  }

  return clauseContext(head.statement, clause, boundaryOf(items.slice(clauseEnd)));
}

function resolveGroup(statement: StatementKind, group: OpenGroup, columnList: boolean): GrammaticalContext {
  const nested = groupTokens(group.inner);
  if (nested.open) {
    return resolveGroup(statement, nested.open, false);
  }
  if (columnList) {
    return resolveColumnList(statement, nested.items);
  }
  return clauseContext(statement, "(", boundaryOf(nested.items));
}

/**
 * Column definitions: `name type [constraint]` entries separated by commas.
 * Commas inside `<...>` belong to a collection type.
 */
function resolveColumnList(statement: StatementKind, items: readonly Item[]): GrammaticalContext {
  let angle = 0;
  let start = 0;
  items.forEach((item, index) => {
    if (item.kind === "operator") {
      angle = Math.max(0, angle + countChar(item.text, "<") - countChar(item.text, ">"));
    } else if (item.kind === "comma" && angle === 0) {
      start = index + 1;
    }
  });

  if (angle > 0) {
    return clauseContext(statement, "columnList", "operand");
  }
  const segment = items.slice(start);
  if (isWord(segment[0], "PRIMARY")) {
    return clauseContext(statement, "PRIMARY KEY", operandBoundary(countOperands(segment)));
  }
  return clauseContext(statement, "columnList", operandBoundary(countOperands(segment)));
}

function countChar(value: string, char: string): number {
  let count = 0;
  for (const c of value) {
    if (c === char) count++;
  }
  return count;
}

function batchBodyContext(): GrammaticalContext {
  return { kind: "clause", tag: "batchBody", statement: "batch", clause: "BATCH", boundary: "separator" };
}
