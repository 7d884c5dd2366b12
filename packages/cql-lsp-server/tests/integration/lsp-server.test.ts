/**
 * Integration tests for the CQL language server.
 *
 * The server and a client talk JSON-RPC over in-memory streams, so these tests
 * cover the full LSP message flow without spawning a process.
 */

import { PassThrough } from "node:stream";
import { describe, test, expect, beforeAll, afterAll } from "vitest";
import {
  CompletionRequest,
  DidChangeConfigurationNotification,
  DidChangeTextDocumentNotification,
  DidCloseTextDocumentNotification,
  DidOpenTextDocumentNotification,
  InitializeRequest,
  InitializedNotification,
  LogMessageNotification,
  ShutdownRequest,
  StreamMessageReader,
  StreamMessageWriter,
  TextDocumentSyncKind,
  createConnection,
  createMessageConnection,
  type CompletionItem,
  type CompletionList,
  type Connection,
  type MessageConnection,
  type Position,
} from "vscode-languageserver/node";
import { createServer, type CqlServer } from "../../src/server";

const QUERY_URI = "file:///workspace/query.cql";
const SCHEMA_URI = "file:///workspace/schema.cql";
const DRAFT_URI = "file:///workspace/draft.cql";

function labelsOf(result: CompletionItem[] | CompletionList | null): string[] {
  const items = Array.isArray(result) ? result : (result?.items ?? []);
  return items.map((item) => item.label);
}

describe("LSP server", () => {
  const clientToServer = new PassThrough();
  const serverToClient = new PassThrough();
  const logs: string[] = [];
  let serverConnection: Connection;
  let server: CqlServer;
  let client: MessageConnection;

  function completeAt(uri: string, position: Position) {
    return client.sendRequest(CompletionRequest.type, { textDocument: { uri }, position });
  }

  beforeAll(() => {
    serverConnection = createConnection(
      new StreamMessageReader(clientToServer),
      new StreamMessageWriter(serverToClient)
    );
    server = createServer(serverConnection);
    serverConnection.listen();

    client = createMessageConnection(
      new StreamMessageReader(serverToClient),
      new StreamMessageWriter(clientToServer)
    );
    client.onNotification(LogMessageNotification.type, (params) => {
      logs.push(params.message);
    });
    client.listen();
  });

  afterAll(() => {
    client.dispose();
    serverConnection.dispose();
  });

  test("initialize negotiates the position encoding and advertises completion", async () => {
    const result = await client.sendRequest(InitializeRequest.type, {
      processId: null,
      rootUri: null,
      capabilities: { general: { positionEncodings: ["utf-8", "utf-16"] } },
    });
    await client.sendNotification(InitializedNotification.type, {});

    expect(result.capabilities.positionEncoding).toBe("utf-8");
    expect(result.capabilities.textDocumentSync).toEqual({
      openClose: true,
      change: TextDocumentSyncKind.Incremental,
    });
    expect(result.capabilities.completionProvider?.triggerCharacters).toEqual([" ", "."]);
    expect(result.serverInfo?.name).toBe("cql-lsp-server");
    expect(server.positionEncoding).toBe("utf-8");
  });

  test("completion follows incremental changes", async () => {
    await client.sendNotification(DidOpenTextDocumentNotification.type, {
      textDocument: { uri: QUERY_URI, languageId: "cql", version: 1, text: "SELECT * FROM events" },
    });
    await client.sendNotification(DidChangeTextDocumentNotification.type, {
      textDocument: { uri: QUERY_URI, version: 2 },
      contentChanges: [
        { range: { start: { line: 0, character: 20 }, end: { line: 0, character: 20 } }, text: " " },
      ],
    });

    const result = await completeAt(QUERY_URI, { line: 0, character: 21 });

    expect(labelsOf(result)).toEqual([
      "WHERE",
      "GROUP BY",
      "ORDER BY",
      "LIMIT",
      "PER PARTITION LIMIT",
      "ALLOW FILTERING",
    ]);
  });

  test("a stale change is logged and ignored", async () => {
    await client.sendNotification(DidChangeTextDocumentNotification.type, {
      textDocument: { uri: QUERY_URI, version: 2 },
      contentChanges: [{ range: { start: { line: 0, character: 0 }, end: { line: 0, character: 0 } }, text: "x" }],
    });
    await completeAt(QUERY_URI, { line: 0, character: 0 });

    expect(server.documents.snapshot(QUERY_URI).text.getText()).toBe("SELECT * FROM events ");
    expect(logs).toContain(
      `Failed to apply change to ${QUERY_URI} (StaleVersion): Stale change for ${QUERY_URI}: received version 2, already at 2`
    );
  });

  test("a document that fell out of sync waits for the whole text", async () => {
    function insertText(version: number, line: number, text: string) {
      return client.sendNotification(DidChangeTextDocumentNotification.type, {
        textDocument: { uri: DRAFT_URI, version },
        contentChanges: [{ range: { start: { line, character: 0 }, end: { line, character: 0 } }, text }],
      });
    }

    await client.sendNotification(DidOpenTextDocumentNotification.type, {
      textDocument: { uri: DRAFT_URI, languageId: "cql", version: 1, text: "abc" },
    });
    await insertText(2, 5, "x");
    await insertText(3, 0, "SELECT ");

    expect(await completeAt(DRAFT_URI, { line: 0, character: 3 })).toEqual([]);
    expect(server.documents.snapshot(DRAFT_URI).text.getText()).toBe("abc");
    expect(logs).toContain(
      `Failed to apply change to ${DRAFT_URI} (InvalidRange): position 5:0 is out of bounds`
    );
    expect(logs).toContain(
      `Failed to apply change to ${DRAFT_URI} (InvalidRange): ${DRAFT_URI} is out of sync; only a full-text change can resynchronize it`
    );

    await client.sendNotification(DidChangeTextDocumentNotification.type, {
      textDocument: { uri: DRAFT_URI, version: 4 },
      contentChanges: [{ text: "SELECT " }],
    });

    expect(labelsOf(await completeAt(DRAFT_URI, { line: 0, character: 7 }))).toEqual([
      "*",
      "DISTINCT",
      "JSON",
      "COUNT",
      "TOKEN",
      "TTL",
      "WRITETIME",
    ]);
  });

  test("pushed settings take effect", async () => {
    await client.sendNotification(DidChangeConfigurationNotification.type, {
      settings: { cql: { completion: { includeDeprecated: false } } },
    });
    await client.sendNotification(DidOpenTextDocumentNotification.type, {
      textDocument: { uri: SCHEMA_URI, languageId: "cql", version: 1, text: "CREATE " },
    });

    const labels = labelsOf(await completeAt(SCHEMA_URI, { line: 0, character: 7 }));

    expect(server.settings.completion.includeDeprecated).toBe(false);
    expect(labels[0]).toBe("KEYSPACE");
    expect(labels).not.toContain("USER");
  });

  test("closed and unknown documents yield no items", async () => {
    await client.sendNotification(DidCloseTextDocumentNotification.type, {
      textDocument: { uri: SCHEMA_URI },
    });

    expect(await completeAt(SCHEMA_URI, { line: 0, character: 7 })).toEqual([]);
    expect(await completeAt("file:///workspace/missing.cql", { line: 0, character: 0 })).toEqual([]);
  });

  test("shutdown drops every document", async () => {
    await client.sendRequest(ShutdownRequest.type);

    expect(server.documents.size).toBe(0);
    expect(logs).toContain("CQL language server shut down");
  });
});
