import * as v from "valibot";
import catalogData from "./data/completion-items.json";

// ============================================================================
// Schema
// ============================================================================

export const CATALOG_ITEM_KINDS = ["keyword", "snippet", "type", "function", "property", "operator"] as const;

export type CatalogItemKind = (typeof CATALOG_ITEM_KINDS)[number];

const DocumentationSchema = v.object({
  synopsis: v.pipe(v.string(), v.minLength(1)),
  example: v.optional(v.string()),
  notes: v.optional(v.array(v.string()), []),
});

const CatalogItemSchema = v.object({
  id: v.pipe(v.string(), v.regex(/^[a-z0-9-]+$/)),
  label: v.pipe(v.string(), v.minLength(1)),
  kind: v.picklist(CATALOG_ITEM_KINDS),
  priority: v.pipe(v.number(), v.integer(), v.minValue(0)),
  insertText: v.optional(v.string()),
  format: v.optional(v.picklist(["plain", "snippet"]), "plain"),
  deprecated: v.optional(v.boolean(), false),
  detail: v.optional(v.string()),
  documentation: DocumentationSchema,
});

const CatalogSchema = v.object({
  items: v.array(CatalogItemSchema),
});

export type CatalogItem = v.InferOutput<typeof CatalogItemSchema>;

/**
 * A catalog item ready to be offered: defaults applied, documentation
 * rendered to Markdown.
 */
export interface CompletionCandidate {
  readonly id: string;
  readonly label: string;
  readonly kind: CatalogItemKind;
  readonly priority: number;
  readonly insertText: string;
  readonly format: "plain" | "snippet";
  readonly deprecated: boolean;
  readonly detail: string | undefined;
  readonly documentation: string;
}

export class CatalogError extends Error {
  constructor(
    message: string,
    readonly path: string = ""
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "CatalogError";
  }
}

// ============================================================================
// Rendering
// ============================================================================

function formatIssuePath(issue: v.BaseIssue<unknown>): string {
  if (!issue.path) return "";

  return issue.path
    .map((segment) => (segment.type === "array" ? `[${String(segment.key)}]` : `.${String(segment.key)}`))
    .join("")
    .replace(/^\./, "");
}

/**
 * Markdown for the hover panel of a completion item.
 */
export function renderDocumentation(documentation: CatalogItem["documentation"]): string {
  const sections = [documentation.synopsis];
  if (documentation.example) {
    sections.push("```cql\n" + documentation.example + "\n```");
  }
  if (documentation.notes.length > 0) {
    sections.push("**Notes**\n\n" + documentation.notes.map((note) => `- ${note}`).join("\n"));
  }
  return sections.join("\n\n");
}

function toCandidate(item: CatalogItem): CompletionCandidate {
  return Object.freeze({
    id: item.id,
    label: item.label,
    kind: item.kind,
    priority: item.priority,
    insertText: item.insertText ?? item.label,
    format: item.format,
    deprecated: item.deprecated,
    detail: item.detail,
    documentation: renderDocumentation(item.documentation),
  });
}

/**
 * Grammar priority first, then label. Plain code unit comparison so the order
 * does not depend on the host locale.
 */
export function compareCandidates(a: CompletionCandidate, b: CompletionCandidate): number {
  if (a.priority !== b.priority) {
    return a.priority - b.priority;
  }
  if (a.label !== b.label) {
    return a.label < b.label ? -1 : 1;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

// ============================================================================
// Catalog
// ============================================================================

/**
 * Validated, immutable set of completion item templates keyed by id.
 */
export class CompletionCatalog {
  private readonly byId: ReadonlyMap<string, CompletionCandidate>;

  constructor(items: readonly CatalogItem[]) {
    const byId = new Map<string, CompletionCandidate>();
    items.forEach((item, index) => {
      if (byId.has(item.id)) {
        throw new CatalogError(`duplicate item id "${item.id}"`, `items[${index}].id`);
      }
      byId.set(item.id, toCandidate(item));
    });
    this.byId = byId;
  }

  /**
   * Validate raw JSON and build a catalog from it.
   *
   * @throws CatalogError on the first schema violation or duplicate id
   */
  static fromJSON(data: unknown): CompletionCatalog {
    const result = v.safeParse(CatalogSchema, data);
    if (!result.success) {
      const issue = result.issues[0];
      throw new CatalogError(issue.message, formatIssuePath(issue));
    }
    return new CompletionCatalog(result.output.items);
  }

  get size(): number {
    return this.byId.size;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /**
   * @throws CatalogError if no item has this id
   */
  get(id: string): CompletionCandidate {
    const candidate = this.byId.get(id);
    if (!candidate) {
      throw new CatalogError(`unknown item id "${id}"`);
    }
    return candidate;
  }

  /**
   * Candidates for `ids` in presentation order.
   */
  resolve(ids: readonly string[]): readonly CompletionCandidate[] {
    return Object.freeze(ids.map((id) => this.get(id)).sort(compareCandidates));
  }
}

let defaultCatalog: CompletionCatalog | null = null;

/**
 * The catalog bundled with the server, validated on first use.
 */
export function getCatalog(): CompletionCatalog {
  if (!defaultCatalog) {
    defaultCatalog = CompletionCatalog.fromJSON(catalogData);
  }
  return defaultCatalog;
}
