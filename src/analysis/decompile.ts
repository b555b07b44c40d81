import type { DecompilerService, ProgramFunction } from "../engine/types.js";
import { errorMessage } from "../utils/errors.js";
import { formatAddress, formatBody } from "./address.js";
import type { DecompiledFunction } from "./schema.js";

export const DEFAULT_DECOMPILE_TIMEOUT_SECONDS = 30;

// Extra time an engine gets past its own timeout before the token is aborted.
const CANCEL_GRACE_MS = 1000;

// Largest delay setTimeout honours; anything longer fires immediately.
const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Decompile `fn` under the engine's timeout. Timeouts, cancellation and empty
 * output all yield null; only a complete result is returned.
 */
export async function decompileFunction(
  decompiler: DecompilerService,
  fn: ProgramFunction | null,
  timeoutSeconds = DEFAULT_DECOMPILE_TIMEOUT_SECONDS,
): Promise<DecompiledFunction | null> {
  if (!fn) return null;

  const controller = new AbortController();
  const delay = timeoutSeconds * 1000 + CANCEL_GRACE_MS;
  // Past the timer range the engine's own timeout is the only limit.
  const backstop = delay <= MAX_TIMER_MS ? setTimeout(() => controller.abort(), delay) : undefined;
  try {
    const results = await decompiler.decompileFunction(fn, timeoutSeconds, controller.signal);
    if (!results.completed || !results.code) return null;
    return {
      name: fn.name,
      entry_point: formatAddress(fn.entryPoint),
      code: results.code,
      signature: fn.signature,
      body: formatBody(fn.body),
    };
  } finally {
    clearTimeout(backstop);
  }
}

/** Closes the decompiler; a failing close is logged, never thrown. */
export function closeDecompiler(decompiler: DecompilerService) {
  try {
    decompiler.closeProgram();
  } catch (e: unknown) {
    console.log(`[report] decompiler close failed: ${errorMessage(e)}`);
  }
}
