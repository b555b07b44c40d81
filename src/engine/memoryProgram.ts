import { DataConflictError, EngineError, InvalidNameError, SnapshotError } from "./errors.js";
import { AddressSet, MemoryAddress, MemoryAddressFactory } from "./memoryAddress.js";
import type { ProgramSnapshot } from "./snapshot.js";
import { BuiltinTypeParser } from "./typeParser.js";
import type {
  Address,
  CommentKind,
  DataType,
  DataUnit,
  FunctionManager,
  Instruction,
  Listing,
  Program,
  ProgramFunction,
  ProgramSymbol,
  SourceType,
  SymbolKind,
  SymbolTable,
} from "./types.js";

class MemorySymbol implements ProgramSymbol {
  constructor(
    private currentName: string,
    readonly address: Address,
    readonly kind: SymbolKind,
    private currentSource: SourceType,
    readonly external: boolean,
  ) {}

  get name() { return this.currentName; }
  get source() { return this.currentSource; }

  setName(name: string, source: SourceType) {
    if (!name || /\s/.test(name)) throw new InvalidNameError(`Invalid symbol name: "${name}"`);
    this.currentName = name;
    this.currentSource = source;
  }
}

// A function's name is its symbol's name, so renaming the symbol renames the function.
class MemoryFunction implements ProgramFunction {
  constructor(
    private readonly symbol: MemorySymbol,
    readonly body: AddressSet,
    private readonly returnType: string,
    private readonly parameters: string[],
  ) {}

  get name() { return this.symbol.name; }
  get entryPoint() { return this.symbol.address; }
  get signature() {
    const params = this.parameters.length ? this.parameters.join(", ") : "void";
    return `${this.returnType} ${this.name}(${params})`;
  }
}

class MemoryInstruction implements Instruction {
  constructor(
    readonly address: Address,
    readonly mnemonic: string,
    readonly operandText: string,
    private readonly bytes: Int8Array,
  ) {}

  get length() { return this.bytes.length; }

  getBytes() { return Int8Array.from(this.bytes); }
}

class MemorySymbolTable implements SymbolTable {
  readonly entries: Address[] = [];
  readonly symbols: MemorySymbol[] = [];

  externalEntryPoints(): Iterable<Address> { return [...this.entries]; }

  allSymbols(): Iterable<ProgramSymbol> { return [...this.symbols]; }

  symbolsAt(address: Address): ProgramSymbol[] {
    return this.symbols.filter(s => !s.external && s.address.equals(address));
  }
}

class MemoryFunctionManager implements FunctionManager {
  readonly list: MemoryFunction[] = [];

  functions(): Iterable<ProgramFunction> { return [...this.list]; }

  functionContaining(address: Address) {
    return this.list.find(f => f.body.contains(address)) ?? null;
  }
}

class MemoryListing implements Listing {
  readonly instructions = new Map<bigint, MemoryInstruction>();
  readonly comments = new Map<CommentKind, Map<bigint, string>>();
  private readonly data = new Map<bigint, DataUnit>();

  instructionAt(address: Address) {
    return this.instructions.get(address.offset) ?? null;
  }

  commentAt(kind: CommentKind, address: Address) {
    return this.comments.get(kind)?.get(address.offset) ?? null;
  }

  dataAt(address: Address) {
    return this.data.get(address.offset) ?? null;
  }

  createData(address: Address, dataType: DataType): DataUnit {
    const last = address.add(dataType.length - 1);
    const overlaps = (start: Address, length: number) =>
      start.offset <= last.offset && address.offset <= start.offset + BigInt(length) - 1n;

    for (const ins of this.instructions.values()) {
      if (overlaps(ins.address, ins.length)) {
        throw new DataConflictError(`Conflicting instruction exists at address ${ins.address}`);
      }
    }
    for (const unit of this.data.values()) {
      if (!unit.address.equals(address) && overlaps(unit.address, unit.dataType.length)) {
        throw new DataConflictError(`Conflicting data exists at address ${unit.address}`);
      }
    }
    const unit: DataUnit = { address, dataType };
    this.data.set(address.offset, unit);
    return unit;
  }
}

export type DecompilationSource = {
  code: string | null;
  latencyMs: number;
};

export class MemoryProgram implements Program {
  readonly name: string;
  readonly languageId: string;
  readonly imageBase: MemoryAddress;
  readonly minAddress: MemoryAddress | null;
  readonly addressFactory: MemoryAddressFactory;
  readonly dataTypeParser: BuiltinTypeParser;
  readonly symbolTable = new MemorySymbolTable();
  readonly functionManager = new MemoryFunctionManager();
  readonly listing = new MemoryListing();
  private readonly decompilation = new Map<bigint, DecompilationSource>();

  constructor(snapshot: ProgramSnapshot) {
    this.name = snapshot.name;
    this.languageId = snapshot.language;
    this.addressFactory = new MemoryAddressFactory(snapshot.pointerSize);
    this.dataTypeParser = new BuiltinTypeParser(snapshot.pointerSize);
    this.imageBase = this.at(snapshot.imageBase, "imageBase");

    const starts = snapshot.memory
      .map((block, i) => this.at(block.start, `memory.${i}.start`))
      .sort((a, b) => a.compareTo(b));
    this.minAddress = starts.length ? starts[0] : null;

    snapshot.entryPoints.forEach((text, i) => {
      this.symbolTable.entries.push(this.at(text, `entryPoints.${i}`));
    });

    snapshot.instructions.forEach((ins, i) => {
      const address = this.at(ins.address, `instructions.${i}.address`);
      if (this.listing.instructions.has(address.offset)) {
        throw new SnapshotError(`Invalid snapshot at instructions.${i}.address: duplicate instruction at ${ins.address}`);
      }
      const bytes = Int8Array.from(ins.bytes.trim().split(/\s+/).map(b => parseInt(b, 16)));
      this.listing.instructions.set(address.offset, new MemoryInstruction(address, ins.mnemonic, ins.operands, bytes));
    });

    const functions = snapshot.functions.map((fn, i) => {
      const entry = this.at(fn.entry, `functions.${i}.entry`);
      const body = new AddressSet(fn.body.map((r, j) => ({
        min: this.at(r.start, `functions.${i}.body.${j}.start`),
        max: this.at(r.end, `functions.${i}.body.${j}.end`),
      })));
      if (!body.contains(entry)) {
        throw new SnapshotError(`Invalid snapshot at functions.${i}.body: body does not contain entry ${fn.entry}`);
      }
      return { fn, entry, body, index: i };
    }).sort((a, b) => a.entry.compareTo(b.entry));

    for (const { fn, entry, body, index } of functions) {
      if (this.decompilation.has(entry.offset)) {
        throw new SnapshotError(`Invalid snapshot at functions.${index}.entry: duplicate function at ${fn.entry}`);
      }
      const symbol = new MemorySymbol(fn.name, entry, "Function", fn.source, false);
      this.symbolTable.symbols.push(symbol);
      this.functionManager.list.push(new MemoryFunction(symbol, body, fn.returnType, fn.parameters));
      this.decompilation.set(entry.offset, { code: fn.decompiled ?? null, latencyMs: fn.decompileLatencyMs });
    }

    snapshot.symbols.forEach((sym, i) => {
      const address = this.at(sym.address, `symbols.${i}.address`);
      const existing = this.symbolTable.symbols.some(s => s.name === sym.name && s.address.equals(address));
      if (!existing) {
        this.symbolTable.symbols.push(new MemorySymbol(sym.name, address, sym.type, sym.source, sym.external));
      }
    });

    snapshot.data.forEach((unit, i) => {
      const address = this.at(unit.address, `data.${i}.address`);
      try {
        this.listing.createData(address, this.dataTypeParser.parse(unit.type));
      } catch (e: unknown) {
        if (e instanceof EngineError) throw new SnapshotError(`Invalid snapshot at data.${i}: ${e.message}`);
        throw e;
      }
    });

    snapshot.comments.forEach((comment, i) => {
      const address = this.at(comment.address, `comments.${i}.address`);
      let byKind = this.listing.comments.get(comment.kind);
      if (!byKind) {
        byKind = new Map();
        this.listing.comments.set(comment.kind, byKind);
      }
      byKind.set(address.offset, comment.text);
    });
  }

  /** Stored decompiler output for the function entered at `entry`. */
  decompilationFor(entry: Address): DecompilationSource | null {
    return this.decompilation.get(entry.offset) ?? null;
  }

  private at(text: string, path: string) {
    try {
      return this.addressFactory.getAddress(text);
    } catch (e: unknown) {
      if (e instanceof EngineError) throw new SnapshotError(`Invalid snapshot at ${path}: ${e.message}`);
      throw e;
    }
  }
}
