import { isDebtEngineError } from "@pf-debt/engine";
import { ZodError } from "zod";

/**
 * Recursively coerce string values that look like numbers into actual numbers.
 * The MCP SDK sometimes passes numeric arguments as strings.
 */
export function coerceNumbers(obj: unknown): unknown {
  if (typeof obj === "string") {
    if (obj === "" || obj === "true" || obj === "false" || obj === "null") return obj;
    const n = Number(obj);
    if (!isNaN(n) && obj.trim() !== "") return n;
    return obj;
  }
  if (Array.isArray(obj)) return obj.map(coerceNumbers);
  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      result[k] = coerceNumbers(v);
    }
    return result;
  }
  return obj;
}

// JSON has no Infinity or NaN; the DSCR sentinel goes out as the string "Infinity"
function finiteOrString(_key: string, value: unknown): unknown {
  return typeof value === "number" && !Number.isFinite(value) ? String(value) : value;
}

export function errorPayload(err: Error): Record<string, unknown> {
  if (isDebtEngineError(err)) {
    return { error: err.message, kind: err.kind, context: err.context };
  }
  if (err instanceof ZodError) {
    return {
      error: "Invalid tool input",
      kind: "validation",
      issues: err.issues.map(issue => ({ path: issue.path.join("."), message: issue.message })),
    };
  }
  return { error: err.message };
}

export type ToolResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export function wrapResponse(result: unknown): ToolResponse {
  if (result instanceof Error) {
    return {
      content: [{ type: "text" as const, text: JSON.stringify(errorPayload(result)) }],
      isError: true,
    };
  }
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, finiteOrString) }],
  };
}

/** Run a tool body and wrap its result, turning any thrown error into an error response. */
export function runTool(body: () => unknown): ToolResponse {
  try {
    return wrapResponse(body());
  } catch (err) {
    return wrapResponse(err instanceof Error ? err : new Error(String(err)));
  }
}
