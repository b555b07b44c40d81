import { z } from "zod";
import { setDataType } from "../analysis/mutations.js";
import { defineTool } from "./types.js";

export const setDataTypeTool = defineTool({
  name: "set_data_type",
  description: "Apply a C type (e.g. int, char *, char[16]) to existing data at an address",
  schema: z.object({ address: z.string(), type: z.string() }),
  mutates: true,
  handler: (ctx, { address, type }) => setDataType(ctx.engine.program, address, type),
});
