#!/usr/bin/env tsx
import { closeServer, getDefaultConfig, initializeServer } from "./data/loader";
import { runServer } from "./server";

const args = process.argv.slice(2);
const command = args[0];

function printUsage(): void {
  console.log(`
reelclean-mcp <command>

Commands:
  serve   Run the MCP server over stdio

Environment:
  STATE_DB_PATH   Pipeline state database (default: ./data/intermediate/state.sqlite)
  REPORT_LIMIT    Row limit applied when a report call gives none
`);
}

async function main(): Promise<void> {
  if (!command || command === "help" || command === "--help") {
    printUsage();
    process.exit(0);
  }

  switch (command) {
    case "serve": {
      const state = await initializeServer(getDefaultConfig());

      const shutdown = (): void => {
        closeServer(state);
        process.exit(0);
      };
      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);

      await runServer(state);
      break;
    }

    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
