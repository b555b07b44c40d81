import type { AnalysisReport } from "../analysis/schema.js";

// Last good report per program. Error reports are never stored.
export class ReportCache {
  private readonly entries = new Map<string, AnalysisReport>();

  get(key: string) {
    return this.entries.get(key) ?? null;
  }

  set(key: string, report: AnalysisReport) {
    this.entries.set(key, report);
  }

  clear(key?: string) {
    if (key === undefined) this.entries.clear();
    else this.entries.delete(key);
  }
}
