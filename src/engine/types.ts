// Capabilities the report pipeline needs from a binary-analysis engine.
// Everything here is engine-defined; reports only ever see canonical strings
// produced by src/analysis/address.ts.

export interface Address {
  readonly space: string;
  readonly offset: bigint;
  /** Throws AddressOverflowError past the end of the space. */
  add(displacement: number | bigint): Address;
  compareTo(other: Address): number;
  equals(other: Address): boolean;
  toString(): string;
}

export type AddressRange = {
  min: Address;
  max: Address; // inclusive
};

export interface AddressSetView {
  readonly minAddress: Address | null;
  readonly maxAddress: Address | null;
  contains(address: Address): boolean;
  ranges(): Iterable<AddressRange>;
}

export interface AddressFactory {
  /** Throws AddressParseError on malformed input. */
  getAddress(text: string): Address;
}

export type SourceType = "DEFAULT" | "ANALYSIS" | "IMPORTED" | "USER_DEFINED";

export type SymbolKind = "Function" | "Label" | "Namespace" | "Class" | "Library" | "Global Var";

export type CommentKind = "EOL" | "PRE" | "POST" | "PLATE" | "REPEATABLE";

export interface ProgramSymbol {
  readonly name: string;
  readonly address: Address;
  readonly kind: SymbolKind;
  readonly source: SourceType;
  readonly external: boolean;
  setName(name: string, source: SourceType): void;
}

export interface SymbolTable {
  externalEntryPoints(): Iterable<Address>;
  allSymbols(): Iterable<ProgramSymbol>;
  /** Non-external symbols bound at `address`, primary first. */
  symbolsAt(address: Address): ProgramSymbol[];
}

export interface ProgramFunction {
  readonly name: string;
  readonly entryPoint: Address;
  readonly signature: string;
  readonly body: AddressSetView;
}

export interface FunctionManager {
  functions(): Iterable<ProgramFunction>;
  functionContaining(address: Address): ProgramFunction | null;
}

export interface Instruction {
  readonly address: Address;
  readonly mnemonic: string;
  readonly operandText: string;
  readonly length: number;
  /** Raw encoding; engines may hand back signed bytes. */
  getBytes(): ArrayLike<number>;
}

export interface DataType {
  readonly name: string;
  readonly length: number;
}

export interface DataUnit {
  readonly address: Address;
  readonly dataType: DataType;
}

export interface Listing {
  instructionAt(address: Address): Instruction | null;
  commentAt(kind: CommentKind, address: Address): string | null;
  dataAt(address: Address): DataUnit | null;
  /** Throws DataConflictError when the new unit cannot be placed. */
  createData(address: Address, dataType: DataType): DataUnit;
}

export interface DataTypeParser {
  /** Throws TypeParseError on unknown or malformed type text. */
  parse(text: string): DataType;
}

export interface Program {
  readonly name: string;
  readonly imageBase: Address;
  readonly languageId: string;
  /** Lowest mapped address, or null for an image with no memory. */
  readonly minAddress: Address | null;
  readonly addressFactory: AddressFactory;
  readonly symbolTable: SymbolTable;
  readonly functionManager: FunctionManager;
  readonly listing: Listing;
  readonly dataTypeParser: DataTypeParser;
}

export type DecompileResults = {
  completed: boolean;
  code: string | null;
  errorMessage: string;
};

export interface DecompilerService {
  openProgram(program: Program): boolean;
  closeProgram(): void;
  /**
   * Resolves once the engine has finished, timed out or honoured `signal`.
   * A timed out or cancelled call resolves with `completed: false`.
   */
  decompileFunction(fn: ProgramFunction, timeoutSeconds: number, signal: AbortSignal): Promise<DecompileResults>;
}

export type AnalysisEngine = {
  program: Program;
  decompiler: DecompilerService;
};
