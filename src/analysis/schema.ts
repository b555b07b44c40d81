import { z } from "zod";

// JSON shapes of everything the pipeline emits. Field names are part of the
// wire format read by downstream tooling; keep them stable.

export const functionRecordSchema = z.object({
  name: z.string(),
  entry_point: z.string(),
  signature: z.string(),
  body_range: z.string(),
});

export const symbolRecordSchema = z.object({
  name: z.string(),
  address: z.string(),
  type: z.string(),
  source: z.string(),
});

export const instructionRecordSchema = z.object({
  address: z.string(),
  mnemonic: z.string(),
  operands: z.string(),
  bytes: z.string(),
  comment: z.string(),
});

export const decompiledFunctionSchema = z.object({
  name: z.string(),
  entry_point: z.string(),
  code: z.string(),
  signature: z.string(),
  body: z.string(),
});

export const analysisReportSchema = z.object({
  program_name: z.string(),
  entry_point: z.string(),
  entry_function: decompiledFunctionSchema.nullable(),
  functions: z.array(functionRecordSchema),
  symbols: z.array(symbolRecordSchema),
  disassembly: z.array(instructionRecordSchema),
  image_base: z.string(),
  language: z.string(),
}).strict();

export const errorReportSchema = z.object({
  error: z.literal(true),
  message: z.string(),
  traceback: z.string(),
  program_name: z.string(),
}).strict();

export const mutationResultSchema = z.object({
  success: z.boolean(),
  message: z.string(),
});

export type FunctionRecord = z.infer<typeof functionRecordSchema>;
export type SymbolRecord = z.infer<typeof symbolRecordSchema>;
export type InstructionRecord = z.infer<typeof instructionRecordSchema>;
export type DecompiledFunction = z.infer<typeof decompiledFunctionSchema>;
export type AnalysisReport = z.infer<typeof analysisReportSchema>;
export type ErrorReport = z.infer<typeof errorReportSchema>;
export type MutationResult = z.infer<typeof mutationResultSchema>;

export type ReportResult = AnalysisReport | ErrorReport;

export function isErrorReport(value: ReportResult): value is ErrorReport {
  return "error" in value && value.error === true;
}
