import { TypeParseError } from "./errors.js";
import type { DataType, DataTypeParser } from "./types.js";

// "pointer" entries take the program's pointer size.
const BUILTIN_SIZES = new Map<string, number | "pointer">([
  ["undefined", 1],
  ["undefined1", 1],
  ["undefined2", 2],
  ["undefined4", 4],
  ["undefined8", 8],
  ["bool", 1],
  ["byte", 1],
  ["char", 1],
  ["uchar", 1],
  ["unsigned char", 1],
  ["short", 2],
  ["ushort", 2],
  ["unsigned short", 2],
  ["word", 2],
  ["int", 4],
  ["uint", 4],
  ["unsigned int", 4],
  ["dword", 4],
  ["float", 4],
  ["long", "pointer"],
  ["ulong", "pointer"],
  ["unsigned long", "pointer"],
  ["long long", 8],
  ["longlong", 8],
  ["unsigned long long", 8],
  ["qword", 8],
  ["double", 8],
  ["pointer", "pointer"],
  ["void", 0],
]);

const TYPE_RE = /^([A-Za-z_]\w*(?:\s+[A-Za-z_]\w*)*)\s*((?:\*\s*)*)((?:\[\s*\d+\s*\]\s*)*)$/;

export class BuiltinTypeParser implements DataTypeParser {
  constructor(private readonly pointerSize: number) {}

  parse(text: string): DataType {
    const m = TYPE_RE.exec(text.trim());
    if (!m) throw new TypeParseError(`Unable to parse data type: "${text}"`);
    const base = m[1].replace(/\s+/g, " ");
    const depth = m[2].replace(/\s+/g, "").length;
    const dims = [...m[3].matchAll(/\d+/g)].map(d => Number(d[0]));

    const size = BUILTIN_SIZES.get(base);
    if (size === undefined) throw new TypeParseError(`Unknown data type: ${base}`);

    let length = depth > 0 ? this.pointerSize : size === "pointer" ? this.pointerSize : size;
    if (length === 0) throw new TypeParseError(`Data type has no size: ${base}`);
    for (const n of dims) {
      if (n === 0) throw new TypeParseError(`Array dimension must be positive: "${text}"`);
      length *= n;
    }

    let name = base;
    if (depth > 0) name += ` ${"*".repeat(depth)}`;
    name += dims.map(n => `[${n}]`).join("");
    return { name, length };
  }
}
