/**
 * miro-mcp server entry point.
 *
 * Thin shell that wires MCP SDK stdio transport ↔ tool registry ↔ Miro
 * client.  Configuration comes from the environment (optionally a .env
 * file); a missing required variable aborts startup.
 *
 * CLI usage:
 *   miro-mcp [options]
 *
 * Options:
 *   --env-file <path>   Load environment variables from <path> instead of ./.env
 *   --help              Show usage information
 */

import * as dotenv from 'dotenv';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ConfigError, loadConfig } from './config';
import { createContext } from './context';
import { createRegistry } from './registry';
import { createServer } from './server';
import { MODULES } from './modules';
import { log } from './logger';

// ── CLI argument parsing ───────────────────────────────────────────────────

interface CliOptions {
  envFile?: string;
}

function printUsage(): void {
  console.error(`Usage: miro-mcp [options]

Options:
  --env-file <path>   Load environment variables from <path> instead of ./.env
  --help              Show this help message and exit.

Environment:
  MIRO_CLIENT_ID       OAuth client id (required)
  MIRO_CLIENT_SECRET   OAuth client secret (required)
  MIRO_REDIRECT_URL    OAuth redirect URL (default http://localhost:8080/callback)
  MIRO_API_BASE_URL    REST API base (default https://api.miro.com)
  MIRO_AUTH_BASE_URL   OAuth authorize base (default https://miro.com)
  MIRO_MCP_DEBUG       Set to 1 to log every request to stderr

MCP configuration (.vscode/mcp.json):
  {
    "servers": {
      "miro": {
        "command": "npx",
        "args": ["tsx", "src/index.ts", "--env-file", ".env"]
      }
    }
  }
`);
}

function parseArgs(argv: string[]): CliOptions {
  const args = argv.slice(2); // skip node + script
  const options: CliOptions = {};

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--env-file': {
        const file = args[++i];
        if (!file) {
          console.error('Error: --env-file requires a file path');
          process.exit(1);
        }
        options.envFile = file;
        break;
      }
      case '--help':
      case '-h':
        printUsage();
        process.exit(0);
        break;
      default:
        console.error(`Unknown option: ${args[i]}`);
        printUsage();
        process.exit(1);
    }
  }

  return options;
}

async function main() {
  const options = parseArgs(process.argv);

  const loaded = dotenv.config(options.envFile ? { path: options.envFile } : {});
  if (options.envFile && loaded.error) {
    throw new ConfigError(`Cannot read env file ${options.envFile}: ${loaded.error.message}`);
  }

  const config = loadConfig();
  const registry = createRegistry(MODULES);
  const server = createServer(registry, createContext(config));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log(`server running on stdio (${registry.list().length} tools)`);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    log(`Configuration error: ${error.message}`);
  } else {
    log('Fatal error in main():', error);
  }
  process.exit(1);
});
