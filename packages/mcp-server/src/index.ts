#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { configFromEnv } from "./config.js";
import { registerProjectFinanceTools } from "./tools/project_finance.js";

const config = configFromEnv();

const server = new McpServer({
  name: "pf-debt-mcp",
  version: "0.1.0",
});

registerProjectFinanceTools(server, config);

const transport = new StdioServerTransport();
await server.connect(transport);
