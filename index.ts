#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from './src/config.js';
import { formatResult, rankDirectory } from './src/rank.js';
import { createServer } from './server.js';

const USAGE = "Usage: corpus-rank <corpus> | --mcp";

async function serve() {
  const server = createServer(loadConfig());
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("Corpus Rank MCP Server running on stdio");
}

async function main(argv: string[]) {
  if (argv.length !== 1) {
    console.error(USAGE);
    process.exit(1);
  }

  if (argv[0] === "--mcp") {
    await serve();
    return;
  }

  const result = await rankDirectory(argv[0], loadConfig());
  console.log(formatResult(result));
}

main(process.argv.slice(2)).catch((error) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
