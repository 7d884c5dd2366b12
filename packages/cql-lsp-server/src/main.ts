#!/usr/bin/env node
import { createConnection, ProposedFeatures } from "vscode-languageserver/node";
import { createServer } from "./server";

// Transport (stdio, node-ipc or socket) comes from the command line arguments
const connection = createConnection(ProposedFeatures.all);

createServer(connection);

connection.listen();
