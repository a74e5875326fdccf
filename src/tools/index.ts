import { ZodError } from "zod";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { authTools } from "./auth.js";
import { customFoodTools } from "./custom-foods.js";
import { diaryTools } from "./diary.js";
import { goalsTools } from "./goals.js";
import { historyTools } from "./history.js";
import { productTools } from "./products.js";
import { statsTools } from "./stats.js";
import type { ToolContext, ToolDefinition, ToolResult } from "./types.js";
import { weightTools } from "./weight.js";

const log = createLogger("tools");

export const tools: ToolDefinition[] = [
  ...authTools,
  ...goalsTools,
  ...productTools,
  ...customFoodTools,
  ...diaryTools,
  ...statsTools,
  ...weightTools,
  ...historyTools,
];

const byName = new Map(tools.map((tool) => [tool.name, tool] as const));

function formatZodError(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`).join("; ");
}

const text = (value: string, isError?: boolean): ToolResult =>
  isError ? { content: [{ type: "text", text: value }], isError: true } : { content: [{ type: "text", text: value }] };

/** Runs a tool by name; every failure becomes an `isError` result. */
export async function callTool(name: string, args: unknown, ctx: ToolContext): Promise<ToolResult> {
  const tool = byName.get(name);
  if (!tool) {
    return text(`Unknown tool: ${name}`, true);
  }

  try {
    return text(await tool.handler(args ?? {}, ctx));
  } catch (error) {
    const message = error instanceof ZodError ? `Invalid input: ${formatZodError(error)}` : errorMessage(error);
    log.debug(`${name} failed: ${message}`);
    return text(`Error: ${message}`, true);
  }
}
