import { z } from "zod";
import { parseAddress } from "../analysis/address.js";
import { closeDecompiler, decompileFunction } from "../analysis/decompile.js";
import { findContainingFunction } from "../analysis/functions.js";
import { defineTool } from "./types.js";

export const decompileTool = defineTool({
  name: "decompile_function",
  description: "Decompile the function containing an address; function is null when there is none or decompilation did not complete",
  schema: z.object({
    address: z.string(),
    timeoutSeconds: z.number().positive().finite().optional(),
  }),
  async handler(ctx, { address, timeoutSeconds }) {
    const { program, decompiler } = ctx.engine;
    const parsed = parseAddress(program, address);
    if (!parsed.ok) return { error: parsed.message };

    const fn = findContainingFunction(program, parsed.address);
    if (!fn || !decompiler.openProgram(program)) return { function: null };
    try {
      return { function: await decompileFunction(decompiler, fn, timeoutSeconds ?? ctx.defaults.decompileTimeoutSeconds) };
    } finally {
      closeDecompiler(decompiler);
    }
  },
});
