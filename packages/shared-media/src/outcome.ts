/**
 * FILE PURPOSE: Tagged result for fallible per-item steps
 *
 * WHY: Download, decode and classifier failures only degrade one item.
 *      Returning them as values keeps the continue-on-error path in the
 *      types instead of in scattered catch blocks.
 */

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(reason: string): Outcome<T> {
  return { ok: false, reason };
}

/** Render a caught value as a one-line reason. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
