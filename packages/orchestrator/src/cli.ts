#!/usr/bin/env tsx
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { listReports } from "@reelclean/analyze";
import { loadTitlesCsv } from "@reelclean/ingest";
import { isCommand } from "./commands";
import { getConfig } from "./config";
import {
  type PipelineConfig,
  getPipelineStatus,
  isStageName,
  nextStage,
  resetPipeline,
  runAll,
  runAudit,
  runBackup,
  runDedup,
  runImpute,
  runIngest,
  runNormalize,
  runReport,
} from "./pipeline/index";
import { MEMORY_PATH, createStateDatabase, getCompletedStages } from "./state/index";

const args = process.argv.slice(2);
const command = args[0];

function printUsage(): void {
  console.log(`
reelclean <command>

Stages (run in this order):
  ingest <csv>    Load a titles CSV into the raw table
  normalize       Parse dates and years into the clean table
  impute          Fill blank director and country with "Unknown"
  backup          Copy the clean table before deduplication
  dedup           Collapse identical rows into the dedup table
  run <csv>       Run every stage above in order

Queries:
  report <name> [--limit N]   Run a report over the dedup table
  reports         List available reports
  audit           Row counts per table and unparsed dates/years
  status          Show which stages have completed
  reset [stage]   Mark a stage and every later one pending again

Environment:
  STATE_DB_PATH   Path to state database (default: ./data/intermediate/state.sqlite)
  REPORT_LIMIT    Default row limit for reports (default: per report)
`);
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function requireArg(index: number, name: string): string {
  const value = args[index];
  if (!value) {
    throw new Error(`Missing argument: ${name}`);
  }
  return value;
}

function flagValue(flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index === -1 ? undefined : args[index + 1];
}

async function main(): Promise<void> {
  if (!command || command === "help" || command === "--help") {
    printUsage();
    process.exit(0);
  }

  if (!isCommand(command)) {
    console.error(`Unknown command: ${command}`);
    printUsage();
    process.exit(1);
  }

  const config = getConfig();
  if (config.stateDbPath !== MEMORY_PATH) {
    mkdirSync(dirname(config.stateDbPath), { recursive: true });
  }

  const db = await createStateDatabase(config.stateDbPath);

  const pipelineConfig: PipelineConfig = {
    stateDb: db,
    onProgress: (stage: string, current: number, total: number, message?: string) => {
      const pct = total === 0 ? "100.0" : ((current / total) * 100).toFixed(1);
      console.log(`[${stage}] ${current}/${total} (${pct}%)${message ? ` - ${message}` : ""}`);
    },
  };

  try {
    switch (command) {
      case "ingest": {
        const { records } = await loadTitlesCsv(requireArg(1, "csv path"));
        print(runIngest(pipelineConfig, records));
        break;
      }

      case "normalize":
        print(runNormalize(pipelineConfig));
        break;

      case "impute":
        print(runImpute(pipelineConfig));
        break;

      case "backup":
        print(runBackup(pipelineConfig));
        break;

      case "dedup":
        print(runDedup(pipelineConfig));
        break;

      case "run": {
        const { records } = await loadTitlesCsv(requireArg(1, "csv path"));
        print(runAll(pipelineConfig, records));
        break;
      }

      case "report": {
        const name = requireArg(1, "report name");
        const limitFlag = flagValue("--limit");
        const limit = limitFlag === undefined ? config.reportLimit : Number(limitFlag);
        print(runReport(db, name, { limit }));
        break;
      }

      case "reports":
        print(listReports());
        break;

      case "audit":
        print(runAudit(db));
        break;

      case "status":
        print({
          stages: getPipelineStatus(db),
          nextStage: nextStage(getCompletedStages(db)),
        });
        break;

      case "reset": {
        const stage = args[1];
        if (stage !== undefined && !isStageName(stage)) {
          throw new Error(`Unknown stage: ${stage}`);
        }
        const reset = resetPipeline(db, stage);
        console.log(`Reset stages: ${reset.join(", ")}`);
        break;
      }
    }
  } finally {
    db.close();
  }
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
