import { AddressOverflowError } from "../engine/errors.js";
import type { Address, Program } from "../engine/types.js";
import { formatAddress } from "./address.js";
import type { InstructionRecord } from "./schema.js";

export const DEFAULT_MAX_INSTRUCTIONS = 100;

/** Two-digit lowercase hex per byte, space separated, always unsigned. */
export function formatBytes(bytes: ArrayLike<number>) {
  return Array.from(bytes, b => (b & 0xff).toString(16).padStart(2, "0")).join(" ");
}

/**
 * Linear walk from `start`: decode, record, advance by the decoded length.
 * Ends at the bound, at the first address with no instruction, or at the end
 * of the address space. A gap ends the walk; it is not an error.
 */
export function walkDisassembly(program: Program, start: Address, maxInstructions = DEFAULT_MAX_INSTRUCTIONS): InstructionRecord[] {
  const { listing } = program;
  const out: InstructionRecord[] = [];
  let cursor = start;

  while (out.length < maxInstructions) {
    const ins = listing.instructionAt(cursor);
    if (!ins) break;

    out.push({
      address: formatAddress(ins.address),
      mnemonic: ins.mnemonic,
      operands: ins.operandText,
      bytes: formatBytes(ins.getBytes()),
      comment: listing.commentAt("EOL", cursor) ?? "",
    });

    try {
      cursor = ins.address.add(ins.length);
    } catch (e: unknown) {
      if (e instanceof AddressOverflowError) break;
      throw e;
    }
  }
  return out;
}
