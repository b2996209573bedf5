/**
 * Outcome of a computation that may fail without aborting its caller.
 */
export type Result<TData, TMeta = unknown> =
  | { ok: true; data: TData; meta?: TMeta }
  | { ok: false; error: string; meta?: TMeta };

export function ok<TData>(data: TData): Result<TData> {
  return { ok: true, data };
}

export function fail<TData = never>(error: string): Result<TData> {
  return { ok: false, error };
}
