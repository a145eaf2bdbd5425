export const COMMANDS = [
  "ingest",
  "normalize",
  "impute",
  "backup",
  "dedup",
  "run",
  "report",
  "reports",
  "audit",
  "status",
  "reset",
] as const;

export type Command = (typeof COMMANDS)[number];

export function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}
