import type { Address, Program } from "../engine/types.js";

/**
 * First external entry point; otherwise the lowest mapped address; otherwise
 * the image base.
 */
export function resolveEntryPoint(program: Program): Address {
  for (const entry of program.symbolTable.externalEntryPoints()) {
    return entry;
  }
  return program.minAddress ?? program.imageBase;
}
