import type { MemoryProgram } from "./memoryProgram.js";
import type { DecompileResults, DecompilerService, Program, ProgramFunction } from "./types.js";

type Outcome = "done" | "timeout" | "cancelled";

function settle(latencyMs: number, timeoutMs: number, signal: AbortSignal): Promise<Outcome> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve("cancelled");
      return;
    }
    const timedOut = latencyMs > timeoutMs;
    const onAbort = () => {
      clearTimeout(timer);
      resolve("cancelled");
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(timedOut ? "timeout" : "done");
    }, timedOut ? timeoutMs : latencyMs);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Serves the decompiler output stored in a program snapshot, after the
 * function's simulated latency. Calls keep no state between them, so a timed
 * out or cancelled call has no effect on the next one.
 */
export class MemoryDecompiler implements DecompilerService {
  private opened = false;

  constructor(private readonly program: MemoryProgram) {}

  openProgram(program: Program) {
    this.opened = program === this.program;
    return this.opened;
  }

  closeProgram() {
    this.opened = false;
  }

  async decompileFunction(fn: ProgramFunction, timeoutSeconds: number, signal: AbortSignal): Promise<DecompileResults> {
    if (!this.opened) return { completed: false, code: null, errorMessage: "No program opened" };

    const source = this.program.decompilationFor(fn.entryPoint);
    const outcome = await settle(source?.latencyMs ?? 0, timeoutSeconds * 1000, signal);
    if (outcome === "timeout") {
      return { completed: false, code: null, errorMessage: `Decompilation timed out after ${timeoutSeconds}s` };
    }
    if (outcome === "cancelled") {
      return { completed: false, code: null, errorMessage: "Decompilation cancelled" };
    }
    return { completed: true, code: source?.code ?? null, errorMessage: "" };
  }
}
