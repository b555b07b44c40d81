import { z } from "zod";
import { DEFAULT_DECOMPILE_TIMEOUT_SECONDS } from "./analysis/decompile.js";
import { DEFAULT_MAX_INSTRUCTIONS } from "./analysis/disassembly.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8787),
  BINREPORT_SNAPSHOT: z.string().min(1).optional(),
  BINREPORT_DECOMPILE_TIMEOUT: z.coerce.number().positive().finite().default(DEFAULT_DECOMPILE_TIMEOUT_SECONDS),
  BINREPORT_MAX_INSTRUCTIONS: z.coerce.number().int().positive().default(DEFAULT_MAX_INSTRUCTIONS),
});

export type AppConfig = {
  port: number;
  snapshotPath: string | null;
  decompileTimeoutSeconds: number;
  maxInstructions: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid environment variable ${issue.path.join(".")}: ${issue.message}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    snapshotPath: e.BINREPORT_SNAPSHOT ?? null,
    decompileTimeoutSeconds: e.BINREPORT_DECOMPILE_TIMEOUT,
    maxInstructions: e.BINREPORT_MAX_INSTRUCTIONS,
  };
}
