export interface OrchestratorConfig {
  stateDbPath: string;
  reportLimit: number | undefined;
}

const DEFAULT_CONFIG: OrchestratorConfig = {
  stateDbPath: "./data/intermediate/state.sqlite",
  reportLimit: undefined,
};

function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return DEFAULT_CONFIG.reportLimit;

  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`Invalid REPORT_LIMIT: ${value} (expected a positive integer)`);
  }
  return limit;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): OrchestratorConfig {
  return {
    stateDbPath: env.STATE_DB_PATH || DEFAULT_CONFIG.stateDbPath,
    reportLimit: parseLimit(env.REPORT_LIMIT),
  };
}
