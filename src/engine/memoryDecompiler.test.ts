import { describe, expect, it } from "vitest";
import { engineFrom, oneFunctionSnapshot, sampleEngine } from "../testing/fixtures.js";
import type { AnalysisEngine, ProgramFunction } from "./types.js";

function firstFunction(engine: AnalysisEngine): ProgramFunction {
  const [fn] = engine.program.functionManager.functions();
  return fn;
}

function slowEngine(latencyMs: number) {
  const input = oneFunctionSnapshot();
  input.functions = [{
    name: "entry",
    entry: "0x1000",
    body: [{ start: "0x1000", end: "0x1009" }],
    decompiled: "int entry(void)\n{\n  return 0x2a;\n}\n",
    decompileLatencyMs: latencyMs,
  }];
  return engineFrom(input);
}

describe("MemoryDecompiler", () => {
  it("requires an opened program", async () => {
    const engine = sampleEngine();
    const results = await engine.decompiler.decompileFunction(firstFunction(engine), 30, new AbortController().signal);
    expect(results).toEqual({ completed: false, code: null, errorMessage: "No program opened" });
  });

  it("opens only its own program", () => {
    const engine = sampleEngine();
    expect(engine.decompiler.openProgram(sampleEngine().program)).toBe(false);
    expect(engine.decompiler.openProgram(engine.program)).toBe(true);
  });

  it("serves stored output", async () => {
    const engine = sampleEngine();
    engine.decompiler.openProgram(engine.program);
    const results = await engine.decompiler.decompileFunction(firstFunction(engine), 30, new AbortController().signal);
    expect(results).toEqual({ completed: true, code: "void _start(void)\n{\n  main();\n  return;\n}\n", errorMessage: "" });
  });

  it("times out and then serves the next call normally", async () => {
    const engine = slowEngine(200);
    engine.decompiler.openProgram(engine.program);
    const fn = firstFunction(engine);
    const late = await engine.decompiler.decompileFunction(fn, 0.05, new AbortController().signal);
    expect(late).toEqual({ completed: false, code: null, errorMessage: "Decompilation timed out after 0.05s" });

    const next = await engine.decompiler.decompileFunction(fn, 1, new AbortController().signal);
    expect(next.completed).toBe(true);
  });

  it("stops when cancelled", async () => {
    const engine = slowEngine(5000);
    engine.decompiler.openProgram(engine.program);
    const controller = new AbortController();
    const pending = engine.decompiler.decompileFunction(firstFunction(engine), 30, controller.signal);
    controller.abort();
    expect(await pending).toEqual({ completed: false, code: null, errorMessage: "Decompilation cancelled" });
  });
});
