import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { isErrorReport, type AnalysisReport } from "./analysis/schema.js";
import { buildReport, type ReportOptions } from "./analysis/report.js";
import type { AnalysisEngine } from "./engine/types.js";
import { toolMap, tools, toolsDescription } from "./tools/index.js";
import type { ToolContext } from "./tools/types.js";
import { ReportCache } from "./utils/cache.js";
import { errorMessage } from "./utils/errors.js";
import { hashForAudit } from "./utils/hash.js";
import { renderDecompilerView, renderDisassemblyListing, renderReportMarkdown } from "./utils/render.js";
import { SerialQueue } from "./utils/serialQueue.js";

export type AppOptions = {
  engine: AnalysisEngine;
  /** Cache key for this program's reports. */
  programKey: string;
  defaults: Required<ReportOptions>;
};

const FORMATS = ["json", "markdown", "listing", "c"] as const;
type Format = (typeof FORMATS)[number];

function isFormat(value: unknown): value is Format {
  return FORMATS.some(f => f === value);
}

export function createApp({ engine, programKey, defaults }: AppOptions) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  const ctx: ToolContext = { engine, defaults };
  const cache = new ReportCache();
  // Reports and mutations share one writer queue so a rename never lands mid-report.
  const queue = new SerialQueue();

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/tools", (req, res) => {
    if (req.query.format === "text") {
      res.type("text/plain").send(toolsDescription());
      return;
    }
    res.json(tools.map(t => ({ name: t.name, description: t.description, mutates: t.mutates })));
  });

  app.get("/report", async (req, res, next) => {
    try {
      const format = req.query.format ?? "json";
      if (!isFormat(format)) {
        res.status(400).json({ error: true, message: `Unknown format: ${String(format)}` });
        return;
      }
      if (req.query.refresh === "1") cache.clear(programKey);

      let report: AnalysisReport | null = cache.get(programKey);
      if (!report) {
        const built = await queue.run(() => buildReport(engine, defaults));
        if (isErrorReport(built)) {
          console.log(`[report] ${programKey} error=${JSON.stringify(built.message)}`);
          if (format === "markdown") res.type("text/markdown").send(renderReportMarkdown(built));
          else res.json(built);
          return;
        }
        cache.set(programKey, built);
        report = built;
        console.log(`[report] ${programKey} functions=${built.functions.length} symbols=${built.symbols.length}`);
      }

      if (format === "json") res.json(report);
      else if (format === "markdown") res.type("text/markdown").send(renderReportMarkdown(report));
      else if (format === "listing") res.type("text/plain").send(renderDisassemblyListing(report));
      else res.type("text/plain").send(renderDecompilerView(report));
    } catch (e: unknown) {
      next(e);
    }
  });

  app.post("/tools/:name", async (req, res, next) => {
    try {
      const tool = toolMap.get(req.params.name);
      if (!tool) {
        res.status(404).json({ error: true, message: `Unknown tool: ${req.params.name}` });
        return;
      }

      const started = Date.now();
      const outcome = await queue.run(() => tool.run(ctx, req.body));
      if (!outcome.ok) {
        res.status(400).json({ error: true, message: `Invalid arguments for ${tool.name}`, issues: outcome.issues });
        return;
      }

      if (tool.mutates) {
        const success = isSuccess(outcome.result);
        if (success) cache.clear(programKey);
        const uid = hashForAudit(req.ip || "x");
        console.log(`[audit] ${uid} tool=${tool.name} success=${success}`);
      }
      console.log(`[tool] ${tool.name} ms=${Date.now() - started}`);
      res.json(outcome.result);
    } catch (e: unknown) {
      next(e);
    }
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatus(err);
    if (status >= 500) console.error(`[error] ${errorMessage(err)}`);
    res.status(status).json({ error: true, message: errorMessage(err) });
  });

  return app;
}

function isSuccess(result: unknown) {
  return typeof result === "object" && result !== null && "success" in result && result.success === true;
}

// body-parser errors carry their own 4xx status
function httpStatus(err: unknown) {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" && err.status >= 400) {
    return err.status;
  }
  return 500;
}
