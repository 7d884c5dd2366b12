import {
  DidChangeConfigurationNotification,
  TextDocumentSyncKind,
} from "vscode-languageserver/node";
import type {
  CompletionItem,
  CompletionParams,
  Connection,
  DidChangeConfigurationParams,
  DidChangeTextDocumentParams,
  DidCloseTextDocumentParams,
  DidOpenTextDocumentParams,
  InitializeParams,
  InitializeResult,
  TextDocumentSyncOptions,
} from "vscode-languageserver/node";
import { getCompletions } from "./completion";
import { DEFAULT_SETTINGS, SETTINGS_SECTION, parseSettings, readSection, type ServerSettings } from "./config";
import { DocumentStore, type Logger } from "./documents";
import { DocumentError, describeError } from "./errors";
import { isPositionEncoding, type PositionEncoding } from "./text-buffer";

/**
 * Characters that make the client ask for completions without an explicit
 * request: after a keyword and after a keyspace qualifier.
 */
export const COMPLETION_TRIGGER_CHARACTERS = [" ", "."];

/**
 * Live state of a server bound to a connection.
 */
export interface CqlServer {
  readonly documents: DocumentStore;
  readonly settings: ServerSettings;
  readonly positionEncoding: PositionEncoding;
}

/**
 * First encoding the client offers that we support; UTF-16 when it offers
 * none, as the protocol requires.
 */
export function negotiatePositionEncoding(offered: readonly string[] | undefined): PositionEncoding {
  return offered?.find(isPositionEncoding) ?? "utf-16";
}

/**
 * Register lifecycle, document sync and completion handlers on `connection`.
 * The caller owns the connection and starts it with `listen()`.
 */
export function createServer(connection: Connection): CqlServer {
  const logger: Logger = connection.console;
  let settings: ServerSettings = DEFAULT_SETTINGS;
  let documents = new DocumentStore({ logger });
  let hasConfigurationCapability = false;

  function applySettings(raw: unknown): void {
    settings = parseSettings(raw, logger);
    documents.setVerifyIncremental(settings.parser.verifyIncremental);
    documents.setTimeSliceMs(settings.parser.timeSliceMs);
  }

  async function pullSettings(): Promise<void> {
    try {
      applySettings(await connection.workspace.getConfiguration(SETTINGS_SECTION));
    } catch (error) {
      logger.error(`Failed to read ${SETTINGS_SECTION} settings: ${describeError(error)}`);
    }
  }

  /**
   * Run a document operation, logging the recoverable failures. The stored
   * snapshot is untouched when the operation throws.
   */
  function withDocumentErrors(action: string, uri: string, operation: () => void): void {
    try {
      operation();
    } catch (error) {
      if (!(error instanceof DocumentError)) {
        throw error;
      }
      reportFailure(action, uri, error);
    }
  }

  function reportFailure(action: string, uri: string, error: unknown): void {
    if (error instanceof DocumentError) {
      logger.error(`Failed to ${action} ${uri} (${error.code}): ${error.message}`);
    } else {
      logger.error(`Failed to ${action} ${uri}: ${describeError(error)}`);
    }
  }

  connection.onInitialize((params: InitializeParams): InitializeResult => {
    const capabilities = params.capabilities;

    hasConfigurationCapability = !!capabilities.workspace?.configuration;

    const positionEncoding = negotiatePositionEncoding(capabilities.general?.positionEncodings);
    documents = new DocumentStore({
      logger,
      encoding: positionEncoding,
      verifyIncremental: settings.parser.verifyIncremental,
      timeSliceMs: settings.parser.timeSliceMs,
    });

    const textDocumentSync: TextDocumentSyncOptions = {
      openClose: true,
      change: TextDocumentSyncKind.Incremental,
    };

    logger.log(`CQL language server initialized (position encoding ${positionEncoding})`);
    return {
      capabilities: {
        positionEncoding,
        textDocumentSync,
        completionProvider: {
          triggerCharacters: COMPLETION_TRIGGER_CHARACTERS,
          resolveProvider: false,
        },
      },
      serverInfo: {
        name: "cql-lsp-server",
      },
    };
  });

  connection.onInitialized(async () => {
    if (hasConfigurationCapability) {
      try {
        await connection.client.register(DidChangeConfigurationNotification.type, undefined);
      } catch (error) {
        logger.error(`Failed to register for configuration changes: ${describeError(error)}`);
      }
      await pullSettings();
    }
    logger.log("CQL language server ready");
  });

  connection.onDidChangeConfiguration(async (params: DidChangeConfigurationParams) => {
    if (hasConfigurationCapability) {
      await pullSettings();
    } else {
      applySettings(readSection(params.settings));
    }
  });

  connection.onDidOpenTextDocument((params: DidOpenTextDocumentParams) => {
    const { uri, text, version } = params.textDocument;
    withDocumentErrors("open", uri, () => {
      documents.open(uri, text, version);
    });
  });

  connection.onDidChangeTextDocument((params: DidChangeTextDocumentParams) => {
    const { uri, version } = params.textDocument;
    documents.changeAsync(uri, params.contentChanges, version).catch((error: unknown) => {
      reportFailure("apply change to", uri, error);
    });
  });

  connection.onDidCloseTextDocument((params: DidCloseTextDocumentParams) => {
    documents.close(params.textDocument.uri);
  });

  connection.onCompletion(async (params: CompletionParams): Promise<CompletionItem[]> => {
    const uri = params.textDocument.uri;
    await documents.settled(uri);
    return getCompletions(documents, uri, params.position, settings.completion);
  });

  connection.onShutdown(() => {
    documents.clear();
    logger.log("CQL language server shut down");
  });

  return {
    get documents() {
      return documents;
    },
    get settings() {
      return settings;
    },
    get positionEncoding() {
      return documents.positionEncoding;
    },
  };
}
