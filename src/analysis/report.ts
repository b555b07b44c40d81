import type { AnalysisEngine, Program } from "../engine/types.js";
import { errorMessage, errorTrace } from "../utils/errors.js";
import { formatAddress } from "./address.js";
import { closeDecompiler, DEFAULT_DECOMPILE_TIMEOUT_SECONDS, decompileFunction } from "./decompile.js";
import { DEFAULT_MAX_INSTRUCTIONS, walkDisassembly } from "./disassembly.js";
import { resolveEntryPoint } from "./entryPoint.js";
import { findContainingFunction, listFunctions } from "./functions.js";
import type { ErrorReport, ReportResult } from "./schema.js";
import { listSymbols } from "./symbols.js";

export const UNKNOWN_PROGRAM = "unknown";

export type ReportOptions = {
  maxInstructions?: number;
  decompileTimeoutSeconds?: number;
};

function programName(program: Program | null) {
  if (!program) return UNKNOWN_PROGRAM;
  try {
    return program.name || UNKNOWN_PROGRAM;
  } catch {
    return UNKNOWN_PROGRAM;
  }
}

export function toErrorReport(e: unknown, program: Program | null): ErrorReport {
  return {
    error: true,
    message: errorMessage(e),
    traceback: errorTrace(e),
    program_name: programName(program),
  };
}

/**
 * Builds the whole report or, if any stage throws, an ErrorReport in its
 * place. There is no partially filled report.
 */
export class ReportAssembler {
  constructor(private readonly engine: AnalysisEngine, private readonly options: ReportOptions = {}) {}

  async assemble(): Promise<ReportResult> {
    const { program, decompiler } = this.engine;
    const maxInstructions = this.options.maxInstructions ?? DEFAULT_MAX_INSTRUCTIONS;
    const timeoutSeconds = this.options.decompileTimeoutSeconds ?? DEFAULT_DECOMPILE_TIMEOUT_SECONDS;

    let opened = false;
    try {
      opened = decompiler.openProgram(program);

      const entry = resolveEntryPoint(program);
      const entryFunction = findContainingFunction(program, entry);
      const decompiled = opened ? await decompileFunction(decompiler, entryFunction, timeoutSeconds) : null;
      const functions = listFunctions(program);
      const symbols = listSymbols(program);
      const disassembly = walkDisassembly(program, entry, maxInstructions);

      return {
        program_name: program.name,
        entry_point: formatAddress(entry),
        entry_function: decompiled,
        functions,
        symbols,
        disassembly,
        image_base: formatAddress(program.imageBase),
        language: program.languageId,
      };
    } catch (e: unknown) {
      return toErrorReport(e, program);
    } finally {
      if (opened) closeDecompiler(decompiler);
    }
  }
}

export function buildReport(engine: AnalysisEngine, options?: ReportOptions) {
  return new ReportAssembler(engine, options).assemble();
}
