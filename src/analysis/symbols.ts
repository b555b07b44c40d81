import type { Program } from "../engine/types.js";
import { formatAddress } from "./address.js";
import type { SymbolRecord } from "./schema.js";

/** Non-external symbols in the symbol table's own order. */
export function listSymbols(program: Program): SymbolRecord[] {
  const out: SymbolRecord[] = [];
  for (const sym of program.symbolTable.allSymbols()) {
    if (sym.external) continue;
    out.push({
      name: sym.name,
      address: formatAddress(sym.address),
      type: sym.kind,
      source: sym.source,
    });
  }
  return out;
}
