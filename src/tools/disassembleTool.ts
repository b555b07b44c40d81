import { z } from "zod";
import { formatAddress, parseAddress } from "../analysis/address.js";
import { walkDisassembly } from "../analysis/disassembly.js";
import { defineTool } from "./types.js";

export const disassembleTool = defineTool({
  name: "disassemble",
  description: "Linear disassembly from an address, up to count instructions",
  schema: z.object({
    address: z.string(),
    count: z.number().int().positive().max(10_000).optional(),
  }),
  handler(ctx, { address, count }) {
    const { program } = ctx.engine;
    const parsed = parseAddress(program, address);
    if (!parsed.ok) return { error: parsed.message };
    return {
      address: formatAddress(parsed.address),
      instructions: walkDisassembly(program, parsed.address, count ?? ctx.defaults.maxInstructions),
    };
  },
});
