import type { Tool } from "./types.js";
import { reportTool } from "./reportTool.js";
import { disassembleTool } from "./disassembleTool.js";
import { decompileTool } from "./decompileTool.js";
import { renameSymbolTool } from "./renameSymbolTool.js";
import { setDataTypeTool } from "./setDataTypeTool.js";

export const tools: Tool[] = [
  reportTool,
  disassembleTool,
  decompileTool,
  renameSymbolTool,
  setDataTypeTool,
];

export function toolsDescription() {
  return tools.map(t => `- ${t.name}: ${t.description}`).join("\n");
}

export const toolMap = new Map(tools.map(t => [t.name, t]));
