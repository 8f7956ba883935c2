/**
 * Retry decision tables.
 *
 * Each remote operation declares, per failure class, whether to retry, how to
 * back off, and which outcome to report once it gives up.
 */

import type { FetchStatus } from "../types.js";

export type FailureClass =
  /** Non-2xx HTTP status, including 429 */
  | "http-status"
  /** Network error or timeout */
  | "transport"
  /** Response body could not be parsed */
  | "malformed"
  /** The service says the identifier has no full text */
  | "unavailable"
  /** Writing the local record failed */
  | "local-io";

export type Backoff = "fixed" | "linear";

export type PolicyRule<Outcome> =
  | { retry: true; backoff: Backoff; outcome: Outcome }
  | { retry: false; outcome: Outcome };

export type RetryPolicy<F extends FailureClass, Outcome> = Readonly<Record<F, PolicyRule<Outcome>>>;

export type RetryDecision<Outcome> =
  | { action: "retry"; delayMs: number }
  | { action: "stop"; outcome: Outcome };

/** efetch: definitive answers and local failures are final, everything else is retried. */
export const FETCH_POLICY: RetryPolicy<FailureClass, Exclude<FetchStatus, "success" | "exists">> = {
  "http-status": { retry: true, backoff: "fixed", outcome: "error" },
  transport: { retry: true, backoff: "linear", outcome: "error" },
  malformed: { retry: true, backoff: "fixed", outcome: "error" },
  unavailable: { retry: false, outcome: "unavailable" },
  "local-io": { retry: false, outcome: "error" },
};

/** esearch: every failure is retried; giving up means "no results". */
export const SEARCH_POLICY: RetryPolicy<"http-status" | "transport" | "malformed", "empty"> = {
  "http-status": { retry: true, backoff: "linear", outcome: "empty" },
  transport: { retry: true, backoff: "linear", outcome: "empty" },
  malformed: { retry: true, backoff: "linear", outcome: "empty" },
};

/** Delay before the next attempt; `attempt` is the 1-based attempt that just failed. */
export function backoffDelay(backoff: Backoff, attempt: number, baseDelayMs: number): number {
  return backoff === "linear" ? baseDelayMs * attempt : baseDelayMs;
}

/**
 * Look up what to do after `attempt` (1-based) of `retries` failed with `failure`.
 */
export function decide<F extends FailureClass, Outcome>(
  policy: RetryPolicy<F, Outcome>,
  failure: F,
  attempt: number,
  retries: number,
  baseDelayMs: number
): RetryDecision<Outcome> {
  const rule = policy[failure];
  if (rule.retry && attempt < retries) {
    return { action: "retry", delayMs: backoffDelay(rule.backoff, attempt, baseDelayMs) };
  }
  return { action: "stop", outcome: rule.outcome };
}
