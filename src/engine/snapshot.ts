import { promises as fs } from "fs";
import { z } from "zod";
import { errorMessage } from "../utils/errors.js";
import { SnapshotError } from "./errors.js";
import { MemoryDecompiler } from "./memoryDecompiler.js";
import { MemoryProgram } from "./memoryProgram.js";
import type { AnalysisEngine } from "./types.js";

const sourceSchema = z.enum(["DEFAULT", "ANALYSIS", "IMPORTED", "USER_DEFINED"]);
const symbolKindSchema = z.enum(["Function", "Label", "Namespace", "Class", "Library", "Global Var"]);
const commentKindSchema = z.enum(["EOL", "PRE", "POST", "PLATE", "REPEATABLE"]);

const hexBytes = z.string().regex(/^\s*[0-9a-fA-F]{2}(?:\s+[0-9a-fA-F]{2})*\s*$/, "expected space-separated hex byte pairs");

export const snapshotSchema = z.object({
  name: z.string().min(1),
  language: z.string().min(1),
  imageBase: z.string(),
  pointerSize: z.union([z.literal(4), z.literal(8)]).default(8),
  entryPoints: z.array(z.string()).default([]),
  memory: z.array(z.object({
    name: z.string(),
    start: z.string(),
    length: z.number().int().positive(),
  })).default([]),
  instructions: z.array(z.object({
    address: z.string(),
    mnemonic: z.string().min(1),
    operands: z.string().default(""),
    bytes: hexBytes,
  })).default([]),
  functions: z.array(z.object({
    name: z.string().min(1),
    entry: z.string(),
    body: z.array(z.object({ start: z.string(), end: z.string() })).min(1),
    returnType: z.string().default("undefined"),
    parameters: z.array(z.string()).default([]),
    source: sourceSchema.default("ANALYSIS"),
    decompiled: z.string().optional(),
    decompileLatencyMs: z.number().nonnegative().default(0),
  })).default([]),
  symbols: z.array(z.object({
    name: z.string().min(1),
    address: z.string(),
    type: symbolKindSchema.default("Label"),
    source: sourceSchema.default("ANALYSIS"),
    external: z.boolean().default(false),
  })).default([]),
  data: z.array(z.object({
    address: z.string(),
    type: z.string(),
  })).default([]),
  comments: z.array(z.object({
    address: z.string(),
    kind: commentKindSchema.default("EOL"),
    text: z.string(),
  })).default([]),
});

export type ProgramSnapshot = z.output<typeof snapshotSchema>;
export type SnapshotInput = z.input<typeof snapshotSchema>;

export function parseSnapshot(raw: unknown): ProgramSnapshot {
  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first.path.length ? first.path.join(".") : "(root)";
    throw new SnapshotError(`Invalid snapshot at ${where}: ${first.message}`);
  }
  return parsed.data;
}

export async function loadSnapshot(path: string): Promise<ProgramSnapshot> {
  let text: string;
  try {
    text = await fs.readFile(path, "utf8");
  } catch (e: unknown) {
    throw new SnapshotError(`Cannot read snapshot ${path}: ${errorMessage(e)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e: unknown) {
    throw new SnapshotError(`Snapshot ${path} is not valid JSON: ${errorMessage(e)}`);
  }
  return parseSnapshot(raw);
}

export function createMemoryEngine(snapshot: ProgramSnapshot): AnalysisEngine {
  const program = new MemoryProgram(snapshot);
  return { program, decompiler: new MemoryDecompiler(program) };
}
