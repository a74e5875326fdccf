#!/usr/bin/env node

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import dotenv from "dotenv";

import { loadConfig, type AppConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { setLogLevel } from "./logger.js";
import { closeDb, getDb } from "./services/database.js";
import { FileKeyValueStore, SecureStore } from "./services/secure-store.js";
import { createToolContext } from "./tools/context.js";
import { callTool, tools } from "./tools/index.js";

// Load environment variables
dotenv.config();

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
}

setLogLevel(config.logLevel);

// Initialize database and session store
const db = getDb(config);
const secure = new SecureStore(new FileKeyValueStore(config.secureStorePath));
const ctx = createToolContext({ db, secure, off: config.off });

// Create server
const server = new Server(
  {
    name: "nutri-diary-mcp",
    version: "1.0.0",
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

// List available tools
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: tools.map(({ name, description, inputSchema }) => ({ name, description, inputSchema })),
  };
});

// Handle tool calls
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return callTool(name, args, ctx);
});

// Cleanup on exit
process.on("SIGINT", () => {
  closeDb();
  process.exit(0);
});

process.on("SIGTERM", () => {
  closeDb();
  process.exit(0);
});

// Start server
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`Nutri Diary MCP server running on stdio (online catalogue ${config.off.enabled ? "on" : "off"})`);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
