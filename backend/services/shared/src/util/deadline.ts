// backend/services/shared/src/util/deadline.ts
/**
 * One cancellation handle per inbound call: the caller's signal combined with
 * a fixed timeout. Every downstream call receives the same signal.
 */

import type { Response } from "express";

export class DeadlineError extends Error {
  public readonly tag: string;

  constructor(tag: string, reason: unknown) {
    super(`${tag}: aborted (${describeReason(reason)})`, { cause: reason });
    this.name = "DeadlineError";
    this.tag = tag;
  }
}

function describeReason(reason: unknown): string {
  if (reason instanceof Error) return reason.name;
  return String(reason);
}

/** Signal aborted by `parent` or after `ms`, whichever comes first. */
export function deadlineSignal(
  parent: AbortSignal | undefined,
  ms: number
): AbortSignal {
  const timeout = AbortSignal.timeout(ms);
  return parent ? AbortSignal.any([parent, timeout]) : timeout;
}

/**
 * Settle with `p`, or reject with DeadlineError as soon as `signal` aborts.
 * The underlying operation is not cancelled; its late result is dropped.
 */
export function raceWithSignal<T>(
  p: Promise<T>,
  signal: AbortSignal,
  tag: string
): Promise<T> {
  if (signal.aborted) {
    // late rejection of the abandoned call has no listener left
    p.catch(() => undefined);
    return Promise.reject(new DeadlineError(tag, signal.reason));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new DeadlineError(tag, signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });
    p.then(
      (v) => {
        signal.removeEventListener("abort", onAbort);
        resolve(v);
      },
      (e: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(e);
      }
    );
  });
}

/** Signal that aborts when the client goes away before the response is finished. */
export function requestSignal(res: Response): AbortSignal {
  const ac = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) ac.abort(new Error("client disconnected"));
  });
  return ac.signal;
}
