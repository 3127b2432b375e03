/**
 * What a tool hands back to the dispatch loop. Failures are values, not exceptions:
 * the `message` is what the model reads, `error` keeps the typed cause for logs and tests.
 */
export type ToolOutcome = { ok: true; message: string } | { ok: false; message: string; error: Error };

export function success(message: string): ToolOutcome {
  return { ok: true, message };
}

export function failure(error: Error, message: string = error.message): ToolOutcome {
  return { ok: false, message, error };
}
