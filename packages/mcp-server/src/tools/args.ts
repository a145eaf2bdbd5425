import type { z } from "zod";

export function parseArgs<T extends z.ZodTypeAny>(
  tool: string,
  schema: T,
  args: unknown
): z.output<T> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid arguments for ${tool}: ${issues}`);
  }
  return result.data;
}
