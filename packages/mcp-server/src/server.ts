import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  type CallToolRequest,
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { REPORT_NAMES } from "@reelclean/analyze";
import type { ServerState } from "./data/loader";
import { parseArgs } from "./tools/args";
import { listAvailableReports, runNamedReport, runReportInput } from "./tools/report";
import { pipelineStatus } from "./tools/status";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export const TOOLS: Tool[] = [
  {
    name: "list_reports",
    description:
      "List the available title reports with their descriptions and default row limits.",
    inputSchema: {
      type: "object",
      properties: {},
    },
  },
  {
    name: "run_report",
    description:
      "Run an aggregate report over the deduplicated titles. Returns the report columns and rows.",
    inputSchema: {
      type: "object",
      properties: {
        name: {
          type: "string",
          enum: [...REPORT_NAMES],
          description: "Report name (e.g., 'top_countries', 'top_cast')",
        },
        limit: {
          type: "number",
          description: "Maximum number of rows (positive integer, defaults to the report's limit)",
        },
      },
      required: ["name"],
    },
  },
  {
    name: "pipeline_status",
    description:
      "Show each pipeline stage with its status, row count and completion time, and the next stage to run.",
    inputSchema: {
      type: "object",
      properties: {},
    },
  },
];

export function callTool(state: ServerState, name: string, args: unknown): ToolResult {
  try {
    state.db.refresh();

    let result: unknown;

    switch (name) {
      case "list_reports": {
        result = listAvailableReports();
        break;
      }

      case "run_report": {
        result = runNamedReport(state, parseArgs(name, runReportInput, args));
        break;
      }

      case "pipeline_status": {
        result = pipelineStatus(state);
        break;
      }

      default:
        throw new Error(`Unknown tool: ${name}`);
    }

    return {
      content: [
        {
          type: "text",
          text: JSON.stringify(result, null, 2),
        },
      ],
    };
  } catch (error) {
    return {
      content: [
        {
          type: "text",
          text: JSON.stringify({
            error: error instanceof Error ? error.message : "Unknown error",
          }),
        },
      ],
      isError: true,
    };
  }
}

export function createServer(state: ServerState): Server {
  const server = new Server(
    { name: "reelclean", version: "0.1.0" },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
    const { name, arguments: args } = request.params;
    return callTool(state, name, args);
  });

  return server;
}

export async function runServer(state: ServerState): Promise<void> {
  const server = createServer(state);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
