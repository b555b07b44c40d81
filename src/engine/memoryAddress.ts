import { AddressOverflowError, AddressParseError } from "./errors.js";
import type { Address, AddressFactory, AddressRange, AddressSetView } from "./types.js";

export const RAM_SPACE = "ram";

const ADDRESS_RE = /^(?:([A-Za-z_]\w*):)?(?:0[xX])?([0-9a-fA-F]+)$/;

function maxOffsetFor(pointerSize: number) {
  return (1n << BigInt(pointerSize * 8)) - 1n;
}

export class MemoryAddress implements Address {
  readonly space = RAM_SPACE;

  constructor(readonly offset: bigint, private readonly pointerSize: number) {}

  add(displacement: number | bigint): MemoryAddress {
    const next = this.offset + BigInt(displacement);
    if (next < 0n || next > maxOffsetFor(this.pointerSize)) {
      throw new AddressOverflowError(`Address overflow: ${this.toString()} + ${displacement}`);
    }
    return new MemoryAddress(next, this.pointerSize);
  }

  compareTo(other: Address) {
    if (this.space !== other.space) return this.space < other.space ? -1 : 1;
    if (this.offset === other.offset) return 0;
    return this.offset < other.offset ? -1 : 1;
  }

  equals(other: Address) {
    return this.compareTo(other) === 0;
  }

  // Native form: zero-padded hex, no prefix.
  toString() {
    return this.offset.toString(16).padStart(this.pointerSize * 2, "0");
  }
}

export class MemoryAddressFactory implements AddressFactory {
  constructor(private readonly pointerSize: number) {}

  getAddress(text: string): MemoryAddress {
    const m = ADDRESS_RE.exec(text.trim());
    if (!m) throw new AddressParseError(`Invalid address: "${text}"`);
    const [, space, digits] = m;
    if (space !== undefined && space !== RAM_SPACE) {
      throw new AddressParseError(`Unknown address space: ${space}`);
    }
    const offset = BigInt(`0x${digits}`);
    if (offset > maxOffsetFor(this.pointerSize)) {
      throw new AddressParseError(`Address out of range: "${text}"`);
    }
    return new MemoryAddress(offset, this.pointerSize);
  }
}

/** Sorted, merged set of inclusive ranges. */
export class AddressSet implements AddressSetView {
  private readonly list: AddressRange[] = [];

  constructor(ranges: AddressRange[]) {
    const sorted = [...ranges].sort((a, b) => a.min.compareTo(b.min));
    for (const r of sorted) {
      const last = this.list.length ? this.list[this.list.length - 1] : null;
      if (last && last.max.space === r.min.space && r.min.offset <= last.max.offset + 1n) {
        if (r.max.compareTo(last.max) > 0) last.max = r.max;
      } else {
        this.list.push({ min: r.min, max: r.max });
      }
    }
  }

  get minAddress() {
    return this.list.length ? this.list[0].min : null;
  }

  get maxAddress() {
    return this.list.length ? this.list[this.list.length - 1].max : null;
  }

  contains(address: Address) {
    return this.list.some(r => r.min.compareTo(address) <= 0 && address.compareTo(r.max) <= 0);
  }

  ranges(): Iterable<AddressRange> {
    return this.list.map(r => ({ ...r }));
  }
}
