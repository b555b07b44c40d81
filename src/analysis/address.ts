import { AddressParseError } from "../engine/errors.js";
import type { Address, AddressSetView, Program } from "../engine/types.js";

export type AddressParse =
  | { ok: true; address: Address }
  | { ok: false; message: string };

/** Canonical report form: `0x` plus lowercase hex, no padding. */
export function formatAddress(address: Address) {
  return `0x${address.offset.toString(16)}`;
}

/** `[min, max]` per contiguous range, inclusive, space separated. */
export function formatBody(body: AddressSetView) {
  return Array.from(body.ranges(), r => `[${formatAddress(r.min)}, ${formatAddress(r.max)}]`).join(" ");
}

export function parseAddress(program: Program, text: string): AddressParse {
  try {
    return { ok: true, address: program.addressFactory.getAddress(text) };
  } catch (e: unknown) {
    if (e instanceof AddressParseError) return { ok: false, message: e.message };
    throw e;
  }
}
