import {
  analysisReportSchema,
  errorReportSchema,
  mutationResultSchema,
  type AnalysisReport,
  type ErrorReport,
  type MutationResult,
} from "../analysis/schema.js";
import { errorMessage } from "./errors.js";

export const JSON_START_MARKER = "__BINREPORT_JSON_START__";
export const JSON_END_MARKER = "__BINREPORT_JSON_END__";

export function formatEnvelope(payload: unknown) {
  return `${JSON_START_MARKER}\n${JSON.stringify(payload, null, 2)}\n${JSON_END_MARKER}\n`;
}

/** Text between the first start marker and the end marker after it, or null. */
export function extractEnvelopeJson(output: string): string | null {
  const start = output.indexOf(JSON_START_MARKER);
  if (start < 0) return null;
  const bodyStart = start + JSON_START_MARKER.length;
  const end = output.indexOf(JSON_END_MARKER, bodyStart);
  if (end < 0) return null;
  return output.slice(bodyStart, end).trim();
}

export type ReportEnvelope =
  | { kind: "report"; report: AnalysisReport }
  | { kind: "error"; report: ErrorReport }
  | { kind: "invalid"; reason: string };

export type MutationEnvelope =
  | { kind: "mutation"; result: MutationResult }
  | { kind: "invalid"; reason: string };

function parseJson(output: string): { ok: true; value: unknown } | { ok: false; reason: string } {
  const text = extractEnvelopeJson(output);
  if (text === null) return { ok: false, reason: "No marked JSON block in output" };
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (e: unknown) {
    return { ok: false, reason: `Failed to parse output: ${errorMessage(e)}` };
  }
}

export function parseReportEnvelope(output: string): ReportEnvelope {
  const json = parseJson(output);
  if (!json.ok) return { kind: "invalid", reason: json.reason };

  const asError = errorReportSchema.safeParse(json.value);
  if (asError.success) return { kind: "error", report: asError.data };

  const asReport = analysisReportSchema.safeParse(json.value);
  if (asReport.success) return { kind: "report", report: asReport.data };

  const issue = asReport.error.issues[0];
  return { kind: "invalid", reason: `Unexpected report shape at ${issue.path.join(".") || "(root)"}: ${issue.message}` };
}

export function parseMutationEnvelope(output: string): MutationEnvelope {
  const json = parseJson(output);
  if (!json.ok) return { kind: "invalid", reason: json.reason };

  const parsed = mutationResultSchema.safeParse(json.value);
  if (!parsed.success) return { kind: "invalid", reason: "Unexpected mutation result shape" };
  return { kind: "mutation", result: parsed.data };
}
