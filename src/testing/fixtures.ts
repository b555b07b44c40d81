import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { createMemoryEngine, parseSnapshot, type SnapshotInput } from "../engine/snapshot.js";
import type { AnalysisEngine } from "../engine/types.js";

export const SAMPLE_SNAPSHOT_PATH = fileURLToPath(new URL("../../fixtures/sample-program.json", import.meta.url));

export function sampleEngine(): AnalysisEngine {
  return createMemoryEngine(parseSnapshot(JSON.parse(readFileSync(SAMPLE_SNAPSHOT_PATH, "utf8"))));
}

export function engineFrom(input: SnapshotInput): AnalysisEngine {
  return createMemoryEngine(parseSnapshot(input));
}

/** One 10-byte function at 0x1000, which is also the entry point. */
export function oneFunctionSnapshot(overrides: Partial<SnapshotInput> = {}): SnapshotInput {
  return {
    name: "tiny",
    language: "x86:LE:32:default",
    imageBase: "0x1000",
    pointerSize: 4,
    entryPoints: ["0x1000"],
    memory: [{ name: ".text", start: "0x1000", length: 16 }],
    instructions: [
      { address: "0x1000", mnemonic: "PUSH", operands: "EBP", bytes: "55" },
      { address: "0x1001", mnemonic: "MOV", operands: "EBP,ESP", bytes: "89 e5" },
      { address: "0x1003", mnemonic: "MOV", operands: "EAX,0x2a", bytes: "b8 2a 00 00 00" },
      { address: "0x1008", mnemonic: "POP", operands: "EBP", bytes: "5d" },
      { address: "0x1009", mnemonic: "RET", operands: "", bytes: "c3" },
    ],
    functions: [{
      name: "entry",
      entry: "0x1000",
      body: [{ start: "0x1000", end: "0x1009" }],
      returnType: "int",
      decompiled: "int entry(void)\n{\n  return 0x2a;\n}\n",
    }],
    ...overrides,
  };
}
