import { z } from "zod";
import { renameSymbol } from "../analysis/mutations.js";
import { defineTool } from "./types.js";

export const renameSymbolTool = defineTool({
  name: "rename_symbol",
  description: "Rename the first symbol at an address (user-defined provenance)",
  schema: z.object({ address: z.string(), name: z.string() }),
  mutates: true,
  handler: (ctx, { address, name }) => renameSymbol(ctx.engine.program, address, name),
});
