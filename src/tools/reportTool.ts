import { z } from "zod";
import { buildReport } from "../analysis/report.js";
import { defineTool } from "./types.js";

export const reportTool = defineTool({
  name: "program_report",
  description: "Entry point, entry function decompilation, function and symbol catalogs and a disassembly window, as one report",
  schema: z.object({
    maxInstructions: z.number().int().positive().max(10_000).optional(),
    timeoutSeconds: z.number().positive().finite().optional(),
  }),
  handler: (ctx, { maxInstructions, timeoutSeconds }) =>
    buildReport(ctx.engine, {
      maxInstructions: maxInstructions ?? ctx.defaults.maxInstructions,
      decompileTimeoutSeconds: timeoutSeconds ?? ctx.defaults.decompileTimeoutSeconds,
    }),
});
