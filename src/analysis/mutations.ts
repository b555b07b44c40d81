import type { Program } from "../engine/types.js";
import { errorMessage } from "../utils/errors.js";
import { parseAddress } from "./address.js";
import type { MutationResult } from "./schema.js";

function failed(message: string): MutationResult {
  return { success: false, message };
}

/** Renames the first symbol bound at the address, as a user-defined name. */
export function renameSymbol(program: Program, addressText: string, newName: string): MutationResult {
  try {
    const parsed = parseAddress(program, addressText);
    if (!parsed.ok) return failed(parsed.message);

    const [first] = program.symbolTable.symbolsAt(parsed.address);
    if (!first) return failed("No symbol found at address");

    first.setName(newName, "USER_DEFINED");
    return { success: true, message: `Renamed to ${newName}` };
  } catch (e: unknown) {
    return failed(errorMessage(e));
  }
}

/**
 * Retypes an existing data unit. Undefined bytes and code are refused before
 * the type text is parsed.
 */
export function setDataType(program: Program, addressText: string, typeText: string): MutationResult {
  try {
    const parsed = parseAddress(program, addressText);
    if (!parsed.ok) return failed(parsed.message);

    const { listing } = program;
    if (!listing.dataAt(parsed.address)) return failed("No data at address");

    const dataType = program.dataTypeParser.parse(typeText);
    listing.createData(parsed.address, dataType);
    return { success: true, message: `Set type to ${typeText}` };
  } catch (e: unknown) {
    return failed(errorMessage(e));
  }
}
