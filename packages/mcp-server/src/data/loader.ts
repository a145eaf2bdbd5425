import { existsSync } from "node:fs";
import { type StateDatabase, getConfig, openStateDatabase } from "@reelclean/orchestrator";

export interface ServerState {
  db: StateDatabase;
  reportLimit: number | undefined;
}

export interface ServerConfig {
  stateDbPath: string;
  reportLimit: number | undefined;
}

export function getDefaultConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const { stateDbPath, reportLimit } = getConfig(env);
  return { stateDbPath, reportLimit };
}

export async function initializeServer(config: ServerConfig): Promise<ServerState> {
  if (!existsSync(config.stateDbPath)) {
    throw new Error(
      `State database not found at ${config.stateDbPath}. Run 'reelclean run <csv>' first.`
    );
  }

  return {
    db: await openStateDatabase(config.stateDbPath),
    reportLimit: config.reportLimit,
  };
}

export function closeServer(state: ServerState): void {
  state.db.close();
}
