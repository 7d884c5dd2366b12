import { describe, test, expect } from "vitest";
import { CompletionItemKind, CompletionItemTag, InsertTextFormat, MarkupKind } from "vscode-languageserver/node";
import { complete, getCompletions, toCompletionItem, type CompletionOptions } from "./completion";
import { CatalogError, CompletionCatalog, getCatalog, renderDocumentation } from "./completion-catalog";
import { DocumentStore } from "./documents";

const silent = { log: () => {}, info: () => {}, warn: () => {}, error: () => {} };

const ALL: CompletionOptions = { includeDeprecated: true, snippets: true };

function labels(candidates: readonly { label: string }[]): string[] {
  return candidates.map((candidate) => candidate.label);
}

function catalogItem(id: string, label: string) {
  return { id, label, kind: "keyword", priority: 10, documentation: { synopsis: label } };
}

describe("completion", () => {
  // ============================================================================
  // Candidate lists
  // ============================================================================

  describe("complete", () => {
    test("statement start offers statements by priority, then label", () => {
      const result = labels(complete({ kind: "statementStart" }));

      expect(result.slice(0, 4)).toEqual(["DELETE", "INSERT INTO", "SELECT", "UPDATE"]);
      expect(result[result.length - 1]).toBe("CREATE USER");
      expect(result).toHaveLength(30);
    });

    test("after CREATE offers object kinds with deprecated ones last", () => {
      const result = complete({
        kind: "clause",
        tag: "createObjectKind",
        statement: "create",
        clause: "CREATE",
        boundary: "keyword",
      });

      expect(labels(result)).toEqual([
        "KEYSPACE",
        "TABLE",
        "INDEX",
        "TYPE",
        "CUSTOM INDEX",
        "MATERIALIZED VIEW",
        "AGGREGATE",
        "FUNCTION",
        "ROLE",
        "TRIGGER",
        "OR REPLACE",
        "USER",
      ]);
      expect(result[result.length - 1]?.deprecated).toBe(true);
    });

    test("after the table name offers the rest of a SELECT", () => {
      const result = complete({
        kind: "clause",
        tag: "selectFilters",
        statement: "select",
        clause: "FROM",
        boundary: "operand",
      });

      expect(labels(result)).toEqual([
        "WHERE",
        "GROUP BY",
        "ORDER BY",
        "LIMIT",
        "PER PARTITION LIMIT",
        "ALLOW FILTERING",
      ]);
    });

    test("suppressed and freeform contexts offer nothing", () => {
      expect(complete({ kind: "suppressed", reason: "string" })).toEqual([]);
      expect(
        complete({ kind: "clause", tag: "freeform", statement: "select", clause: "WHERE", boundary: "operator" })
      ).toEqual([]);
    });

    test("identical contexts return the same list", () => {
      const first = complete({ kind: "statementStart" });
      const second = complete({ kind: "statementStart" });
      expect(second).toBe(first);
    });
  });

  // ============================================================================
  // LSP items
  // ============================================================================

  describe("toCompletionItem", () => {
    test("deprecated items are tagged", () => {
      const item = toCompletionItem(getCatalog().get("create-user"), 0);

      expect(item.label).toBe("CREATE USER");
      expect(item.kind).toBe(CompletionItemKind.Keyword);
      expect(item.sortText).toBe("0000");
      expect(item.insertText).toBe("CREATE USER");
      expect(item.insertTextFormat).toBe(InsertTextFormat.PlainText);
      expect(item.detail).toBe("Define a user account");
      expect(item.tags).toEqual([CompletionItemTag.Deprecated]);
    });

    test("snippets keep their placeholders", () => {
      const item = toCompletionItem(getCatalog().get("type-map"), 23);

      expect(item.kind).toBe(CompletionItemKind.TypeParameter);
      expect(item.sortText).toBe("0023");
      expect(item.insertText).toBe("map<${1:text}, ${2:text}>");
      expect(item.insertTextFormat).toBe(InsertTextFormat.Snippet);
      expect(item.tags).toBeUndefined();
      expect(item.detail).toBeUndefined();
    });

    test("documentation is Markdown", () => {
      const item = toCompletionItem(getCatalog().get("where"), 0);
      expect(item.documentation).toEqual({
        kind: MarkupKind.Markdown,
        value: "Restrict the rows by primary key or indexed columns.",
      });
    });
  });

  describe("renderDocumentation", () => {
    test("joins synopsis, example and notes", () => {
      expect(
        renderDocumentation({ synopsis: "Does a thing.", example: "SELECT 1;", notes: ["First.", "Second."] })
      ).toBe("Does a thing.\n\n```cql\nSELECT 1;\n```\n\n**Notes**\n\n- First.\n- Second.");
    });

    test("a synopsis alone", () => {
      expect(renderDocumentation({ synopsis: "Only this.", notes: [] })).toBe("Only this.");
    });
  });

  // ============================================================================
  // Catalog
  // ============================================================================

  describe("CompletionCatalog", () => {
    test("the bundled catalog loads", () => {
      const catalog = getCatalog();
      expect(catalog.has("select")).toBe(true);
      expect(catalog.get("insert").label).toBe("INSERT INTO");
    });

    test("unknown ids are rejected", () => {
      expect(() => getCatalog().get("nope")).toThrow('unknown item id "nope"');
    });

    test("duplicate ids are rejected", () => {
      const data = { items: [catalogItem("on", "ON"), catalogItem("on", "ON")] };
      expect(() => CompletionCatalog.fromJSON(data)).toThrow('items[1].id: duplicate item id "on"');
    });

    test("schema violations name the offending field", () => {
      const data = { items: [catalogItem("Bad Id", "X")] };
      expect(() => CompletionCatalog.fromJSON(data)).toThrow(CatalogError);
      expect(() => CompletionCatalog.fromJSON(data)).toThrow(/^items\[0\]\.id: /);
    });

    test("defaults are applied", () => {
      const catalog = CompletionCatalog.fromJSON({ items: [catalogItem("on", "ON")] });
      expect(catalog.get("on")).toMatchObject({
        insertText: "ON",
        format: "plain",
        deprecated: false,
        documentation: "ON",
      });
    });

    test("resolve sorts equal priorities by label", () => {
      const catalog = CompletionCatalog.fromJSON({
        items: [catalogItem("b", "B"), catalogItem("a", "A"), catalogItem("c", "C")],
      });
      expect(labels(catalog.resolve(["c", "a", "b"]))).toEqual(["A", "B", "C"]);
    });
  });

  // ============================================================================
  // Requests
  // ============================================================================

  describe("getCompletions", () => {
    const URI = "file:///test/completion.cql";

    test("completes at a position in an open document", () => {
      const store = new DocumentStore({ logger: silent });
      store.open(URI, "CREATE ");
      const items = getCompletions(store, URI, { line: 0, character: 7 }, ALL);

      expect(items[0]?.label).toBe("KEYSPACE");
      expect(items.map((item) => item.sortText)).toEqual(items.map((_, index) => String(index).padStart(4, "0")));
    });

    test("deprecated items can be left out", () => {
      const store = new DocumentStore({ logger: silent });
      store.open(URI, "CREATE ");
      const items = getCompletions(store, URI, { line: 0, character: 7 }, { ...ALL, includeDeprecated: false });

      expect(items.map((item) => item.label)).not.toContain("USER");
      expect(items).toHaveLength(11);
    });

    test("snippets can be left out", () => {
      const store = new DocumentStore({ logger: silent });
      store.open(URI, "");
      const items = getCompletions(store, URI, { line: 0, character: 0 }, { ...ALL, snippets: false });

      expect(items).toHaveLength(27);
      expect(items.some((item) => item.insertTextFormat === InsertTextFormat.Snippet)).toBe(false);
    });

    test("unknown documents yield no items", () => {
      const store = new DocumentStore({ logger: silent });
      expect(getCompletions(store, URI, { line: 0, character: 0 }, ALL)).toEqual([]);
    });

    test("documents out of sync with the client yield no items", () => {
      const store = new DocumentStore({ logger: silent });
      store.open(URI, "CREATE ", 1);
      expect(() =>
        store.change(URI, [{ range: { start: { line: 3, character: 0 }, end: { line: 3, character: 0 } }, text: "x" }], 2)
      ).toThrow();

      expect(getCompletions(store, URI, { line: 0, character: 7 }, ALL)).toEqual([]);
    });
  });
});
