import type { z } from "zod";
import type { ReportOptions } from "../analysis/report.js";
import type { AnalysisEngine } from "../engine/types.js";

export type ToolContext = {
  engine: AnalysisEngine;
  defaults: Required<ReportOptions>;
};

export type ToolOutcome =
  | { ok: true; result: unknown }
  | { ok: false; issues: z.ZodIssue[] };

export type Tool = {
  name: string;
  description: string;
  /** Writes to the engine's program state. */
  mutates: boolean;
  run: (ctx: ToolContext, rawArgs: unknown) => Promise<ToolOutcome>;
};

export function defineTool<S extends z.ZodTypeAny>(def: {
  name: string;
  description: string;
  schema: S;
  mutates?: boolean;
  handler: (ctx: ToolContext, args: z.output<S>) => unknown;
}): Tool {
  return {
    name: def.name,
    description: def.description,
    mutates: def.mutates ?? false,
    async run(ctx, rawArgs) {
      const parsed = def.schema.safeParse(rawArgs ?? {});
      if (!parsed.success) return { ok: false, issues: parsed.error.issues };
      return { ok: true, result: await def.handler(ctx, parsed.data) };
    },
  };
}
