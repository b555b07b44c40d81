import type { Address, Program, ProgramFunction } from "../engine/types.js";
import { formatAddress, formatBody } from "./address.js";
import type { FunctionRecord } from "./schema.js";

export function toFunctionRecord(fn: ProgramFunction): FunctionRecord {
  return {
    name: fn.name,
    entry_point: formatAddress(fn.entryPoint),
    signature: fn.signature,
    body_range: formatBody(fn.body),
  };
}

// Engine iteration order, unfiltered.
export function listFunctions(program: Program): FunctionRecord[] {
  return Array.from(program.functionManager.functions(), toFunctionRecord);
}

export function findContainingFunction(program: Program, address: Address): ProgramFunction | null {
  return program.functionManager.functionContaining(address);
}
