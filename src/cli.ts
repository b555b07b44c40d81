import { z } from "zod";
import { renameSymbol, setDataType } from "./analysis/mutations.js";
import { buildReport, toErrorReport } from "./analysis/report.js";
import { isErrorReport, type MutationResult, type ReportResult } from "./analysis/schema.js";
import { loadConfig } from "./config.js";
import { createMemoryEngine, loadSnapshot } from "./engine/snapshot.js";
import type { Program } from "./engine/types.js";
import { formatEnvelope } from "./utils/envelope.js";
import { errorMessage } from "./utils/errors.js";
import { renderDecompilerView, renderDisassemblyListing, renderReportMarkdown } from "./utils/render.js";

export type CliIO = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

export const USAGE = [
  "usage: binreport analyze <snapshot.json> [--max-instructions N] [--timeout S] [--format json|markdown|listing|c]",
  "       binreport rename  <snapshot.json> <address> <name>",
  "       binreport retype  <snapshot.json> <address> <type>",
].join("\n");

const analyzeFlags = z.object({
  "max-instructions": z.coerce.number().int().positive().optional(),
  "timeout": z.coerce.number().positive().finite().optional(),
  "format": z.enum(["json", "markdown", "listing", "c"]).default("json"),
}).strict();

type Format = z.output<typeof analyzeFlags>["format"];

export type Command =
  | { kind: "analyze"; snapshot: string; format: Format; maxInstructions?: number; timeoutSeconds?: number }
  | { kind: "rename"; snapshot: string; address: string; name: string }
  | { kind: "retype"; snapshot: string; address: string; type: string }
  | { kind: "help" }
  | { kind: "usage"; error: string };

export function parseArgs(argv: string[]): Command {
  const positional: string[] = [];
  const flags: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") return { kind: "help" };
    if (arg.startsWith("--")) {
      const value = argv[i + 1];
      if (value === undefined) return { kind: "usage", error: `Missing value for ${arg}` };
      flags[arg.slice(2)] = value;
      i++;
    } else {
      positional.push(arg);
    }
  }

  const [command, ...rest] = positional;
  if (command === undefined) return { kind: "usage", error: "Missing command" };

  if (command === "analyze") {
    if (rest.length !== 1) return { kind: "usage", error: "analyze takes exactly one snapshot path" };
    const parsed = analyzeFlags.safeParse(flags);
    if (!parsed.success) return { kind: "usage", error: parsed.error.issues[0].message };
    return {
      kind: "analyze",
      snapshot: rest[0],
      format: parsed.data.format,
      maxInstructions: parsed.data["max-instructions"],
      timeoutSeconds: parsed.data.timeout,
    };
  }

  if (command === "rename" || command === "retype") {
    if (Object.keys(flags).length) return { kind: "usage", error: `${command} takes no options` };
    if (rest.length !== 3) return { kind: "usage", error: `${command} takes <snapshot.json> <address> <value>` };
    const [snapshot, address, value] = rest;
    return command === "rename"
      ? { kind: "rename", snapshot, address, name: value }
      : { kind: "retype", snapshot, address, type: value };
  }

  return { kind: "usage", error: `Unknown command: ${command}` };
}

function render(report: ReportResult, format: Format) {
  if (format === "json") return formatEnvelope(report);
  if (isErrorReport(report) || format === "markdown") return `${renderReportMarkdown(report)}\n`;
  if (format === "listing") return `${renderDisassemblyListing(report)}\n`;
  return `${renderDecompilerView(report)}\n`;
}

async function analyze(cmd: Extract<Command, { kind: "analyze" }>, io: CliIO, env: NodeJS.ProcessEnv) {
  let program: Program | null = null;
  let report: ReportResult;
  try {
    const config = loadConfig(env);
    const engine = createMemoryEngine(await loadSnapshot(cmd.snapshot));
    program = engine.program;
    report = await buildReport(engine, {
      maxInstructions: cmd.maxInstructions ?? config.maxInstructions,
      decompileTimeoutSeconds: cmd.timeoutSeconds ?? config.decompileTimeoutSeconds,
    });
  } catch (e: unknown) {
    report = toErrorReport(e, program);
  }

  if (isErrorReport(report)) {
    io.stderr(`[headless] analysis failed: ${report.message}\n`);
  } else {
    io.stderr(`[headless] ${report.program_name}: ${report.functions.length} functions, ${report.symbols.length} symbols, ${report.disassembly.length} instructions\n`);
  }
  io.stdout(render(report, cmd.format));
}

async function mutate(cmd: Extract<Command, { kind: "rename" | "retype" }>, io: CliIO) {
  let result: MutationResult;
  try {
    const { program } = createMemoryEngine(await loadSnapshot(cmd.snapshot));
    result = cmd.kind === "rename"
      ? renameSymbol(program, cmd.address, cmd.name)
      : setDataType(program, cmd.address, cmd.type);
  } catch (e: unknown) {
    result = { success: false, message: errorMessage(e) };
  }
  io.stderr(`[headless] ${cmd.kind} ${cmd.address}: ${result.message}\n`);
  io.stdout(formatEnvelope(result));
}

/** Runs one headless request and returns the process exit code. */
export async function runHeadless(argv: string[], io: CliIO, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const cmd = parseArgs(argv);
  switch (cmd.kind) {
    case "help":
      io.stdout(`${USAGE}\n`);
      return 0;
    case "usage":
      io.stderr(`${cmd.error}\n${USAGE}\n`);
      return 2;
    case "analyze":
      await analyze(cmd, io, env);
      return 0;
    case "rename":
    case "retype":
      await mutate(cmd, io);
      return 0;
  }
}
