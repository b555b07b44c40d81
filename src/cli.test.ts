import { describe, expect, it } from "vitest";
import { parseArgs, runHeadless, USAGE } from "./cli.js";
import { SAMPLE_SNAPSHOT_PATH } from "./testing/fixtures.js";
import { parseMutationEnvelope, parseReportEnvelope } from "./utils/envelope.js";

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: { stdout: (text: string) => { out.push(text); }, stderr: (text: string) => { err.push(text); } },
    stdout: () => out.join(""),
    stderr: () => err.join(""),
  };
}

describe("parseArgs", () => {
  it("reads analyze flags", () => {
    expect(parseArgs(["analyze", "p.json", "--max-instructions", "5", "--format", "listing"])).toEqual({
      kind: "analyze",
      snapshot: "p.json",
      format: "listing",
      maxInstructions: 5,
      timeoutSeconds: undefined,
    });
  });

  it("reads mutation positionals", () => {
    expect(parseArgs(["rename", "p.json", "0x10", "main"])).toEqual({ kind: "rename", snapshot: "p.json", address: "0x10", name: "main" });
    expect(parseArgs(["retype", "p.json", "0x10", "int"])).toEqual({ kind: "retype", snapshot: "p.json", address: "0x10", type: "int" });
  });

  it("explains what is wrong with the command line", () => {
    expect(parseArgs([])).toEqual({ kind: "usage", error: "Missing command" });
    expect(parseArgs(["analyze"])).toEqual({ kind: "usage", error: "analyze takes exactly one snapshot path" });
    expect(parseArgs(["analyze", "p.json", "--timeout"])).toEqual({ kind: "usage", error: "Missing value for --timeout" });
    expect(parseArgs(["rename", "p.json", "0x10"])).toEqual({ kind: "usage", error: "rename takes <snapshot.json> <address> <value>" });
    expect(parseArgs(["retype", "p.json", "0x10", "int", "--format", "json"])).toEqual({ kind: "usage", error: "retype takes no options" });
    expect(parseArgs(["frobnicate"])).toEqual({ kind: "usage", error: "Unknown command: frobnicate" });
    expect(parseArgs(["analyze", "p.json", "--format", "xml"]).kind).toBe("usage");
    expect(parseArgs(["analyze", "p.json", "--bogus", "1"]).kind).toBe("usage");
    expect(parseArgs(["analyze", "p.json", "--timeout", "Infinity"])).toEqual({ kind: "usage", error: "Number must be finite" });
  });

  it("prefers help over everything else", () => {
    expect(parseArgs(["analyze", "--help"])).toEqual({ kind: "help" });
  });
});

describe("runHeadless", () => {
  it("prints the report envelope and a summary on stderr", async () => {
    const c = capture();
    expect(await runHeadless(["analyze", SAMPLE_SNAPSHOT_PATH], c.io, {})).toBe(0);

    const parsed = parseReportEnvelope(c.stdout());
    expect(parsed.kind).toBe("report");
    expect(parsed.kind === "report" && parsed.report.entry_point).toBe("0x101000");
    expect(c.stderr()).toBe("[headless] hello: 3 functions, 5 symbols, 13 instructions\n");
  });

  it("lets flags override the environment", async () => {
    const c = capture();
    await runHeadless(["analyze", SAMPLE_SNAPSHOT_PATH, "--max-instructions", "2"], c.io, { BINREPORT_MAX_INSTRUCTIONS: "50" });
    const parsed = parseReportEnvelope(c.stdout());
    expect(parsed.kind === "report" && parsed.report.disassembly.length).toBe(2);
  });

  it("emits an error report when the snapshot cannot be read", async () => {
    const c = capture();
    expect(await runHeadless(["analyze", "/nonexistent/program.json"], c.io, {})).toBe(0);

    const parsed = parseReportEnvelope(c.stdout());
    expect(parsed.kind).toBe("error");
    expect(parsed.kind === "error" && parsed.report.program_name).toBe("unknown");
    expect(parsed.kind === "error" && parsed.report.message.startsWith("Cannot read snapshot /nonexistent/program.json")).toBe(true);
    expect(c.stderr().startsWith("[headless] analysis failed: Cannot read snapshot")).toBe(true);
  });

  it("emits an error report for bad configuration", async () => {
    const c = capture();
    await runHeadless(["analyze", SAMPLE_SNAPSHOT_PATH], c.io, { BINREPORT_DECOMPILE_TIMEOUT: "-1" });
    const parsed = parseReportEnvelope(c.stdout());
    expect(parsed.kind === "error" && parsed.report.message)
      .toBe("Invalid environment variable BINREPORT_DECOMPILE_TIMEOUT: Number must be greater than 0");
  });

  it("renders text formats", async () => {
    const listing = capture();
    await runHeadless(["analyze", SAMPLE_SNAPSHOT_PATH, "--format", "listing"], listing.io, {});
    expect(listing.stdout().startsWith("; Disassembly\n; Binary: hello\n")).toBe(true);

    const view = capture();
    await runHeadless(["analyze", SAMPLE_SNAPSHOT_PATH, "--format", "c"], view.io, {});
    expect(view.stdout().startsWith("// Decompiler\n")).toBe(true);

    const failed = capture();
    await runHeadless(["analyze", "/nonexistent/program.json", "--format", "c"], failed.io, {});
    expect(failed.stdout().startsWith("# Analysis report\n\n- Program: unknown\n- Status: error\n")).toBe(true);
  });

  it("prints mutation results", async () => {
    const renamed = capture();
    expect(await runHeadless(["rename", SAMPLE_SNAPSHOT_PATH, "0x101010", "entry_main"], renamed.io, {})).toBe(0);
    expect(parseMutationEnvelope(renamed.stdout())).toEqual({ kind: "mutation", result: { success: true, message: "Renamed to entry_main" } });
    expect(renamed.stderr()).toBe("[headless] rename 0x101010: Renamed to entry_main\n");

    const retyped = capture();
    await runHeadless(["retype", SAMPLE_SNAPSHOT_PATH, "0x101000", "int"], retyped.io, {});
    expect(parseMutationEnvelope(retyped.stdout())).toEqual({ kind: "mutation", result: { success: false, message: "No data at address" } });
  });

  it("prints usage", async () => {
    const help = capture();
    expect(await runHeadless(["--help"], help.io, {})).toBe(0);
    expect(help.stdout()).toBe(`${USAGE}\n`);

    const wrong = capture();
    expect(await runHeadless([], wrong.io, {})).toBe(2);
    expect(wrong.stderr()).toBe(`Missing command\n${USAGE}\n`);
    expect(wrong.stdout()).toBe("");
  });
});
