import { performance } from "node:perf_hooks";
import { setTimeout as sleep } from "node:timers/promises";

import {
  formatEndpoint,
  type Endpoint,
  type GateLogger,
  type RetryPolicy,
  type WaitOutcome,
} from "../contracts/gate";
import { GateError, exitCodeForSignal, isAbortError } from "../gates/gate_error";
import { probeEndpoint, type ProbeOptions } from "./tcp_probe";

export type ProbeImpl = (endpoint: Endpoint, opts: ProbeOptions) => Promise<boolean>;

export type WaitOptions = {
  log: GateLogger;
  signal?: AbortSignal;
  probeImpl?: ProbeImpl;
  sleepImpl?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
};

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await sleep(ms, undefined, { signal });
};

const abortedError = (endpoint: Endpoint, attempts: number, signal?: AbortSignal) =>
  new GateError({
    code: "aborted",
    message: `Wait for ${formatEndpoint(endpoint)} aborted after ${attempts} attempt(s)`,
    exitCode: exitCodeForSignal(signal?.reason),
    endpoint: formatEndpoint(endpoint),
  });

export async function waitForEndpoint(
  endpoint: Endpoint,
  policy: RetryPolicy,
  opts: WaitOptions
): Promise<WaitOutcome> {
  const probe = opts.probeImpl ?? probeEndpoint;
  const sleepImpl = opts.sleepImpl ?? defaultSleep;
  const now = opts.now ?? (() => performance.now());
  const target = formatEndpoint(endpoint);
  const startedAt = now();

  for (let attempt = 1; ; attempt += 1) {
    let reason: string | undefined;
    let ok: boolean;

    // A probe may not outlast the deadline by more than one interval
    const probeTimeoutMs =
      policy.timeoutMs === "unbounded"
        ? policy.connectTimeoutMs
        : Math.max(
            1,
            Math.min(
              policy.connectTimeoutMs,
              policy.timeoutMs + policy.intervalMs - Math.round(now() - startedAt)
            )
          );

    try {
      ok = await probe(endpoint, {
        timeoutMs: probeTimeoutMs,
        signal: opts.signal,
        onFailure: (failure) => {
          reason = failure;
        },
      });
    } catch (error) {
      if (isAbortError(error)) throw abortedError(endpoint, attempt, opts.signal);
      throw error;
    }

    const elapsedMs = Math.round(now() - startedAt);

    if (ok) {
      opts.log.info({ evt: "gate.endpoint.ready", endpoint: target, attempts: attempt, elapsedMs }, "gate.endpoint.ready");
      return { status: "ready", attempts: attempt, elapsedMs };
    }

    if (policy.timeoutMs !== "unbounded" && elapsedMs >= policy.timeoutMs) {
      opts.log.error(
        {
          evt: "gate.endpoint.timed_out",
          endpoint: target,
          attempts: attempt,
          elapsedMs,
          timeoutMs: policy.timeoutMs,
          reason,
        },
        "gate.endpoint.timed_out"
      );
      return { status: "timed_out", attempts: attempt, elapsedMs };
    }

    // Last sleep is cut short at the deadline
    const delayMs =
      policy.timeoutMs === "unbounded"
        ? policy.intervalMs
        : Math.min(policy.intervalMs, policy.timeoutMs - elapsedMs);

    opts.log.info(
      {
        evt: "gate.probe.failed",
        endpoint: target,
        attempt,
        elapsedMs,
        retryDelayMs: delayMs,
        reason,
      },
      "gate.probe.failed"
    );

    try {
      await sleepImpl(delayMs, opts.signal);
    } catch (error) {
      if (isAbortError(error)) throw abortedError(endpoint, attempt, opts.signal);
      throw error;
    }
  }
}

export type MultiWaitOutcome =
  | { status: "ready"; attempts: number; elapsedMs: number }
  | { status: "timed_out"; attempts: number; elapsedMs: number; endpoint: Endpoint };

/**
 * Waits for each endpoint in order against one shared deadline.
 */
export async function waitForEndpoints(
  endpoints: Endpoint[],
  policy: RetryPolicy,
  opts: WaitOptions
): Promise<MultiWaitOutcome> {
  const now = opts.now ?? (() => performance.now());
  const startedAt = now();
  let attempts = 0;

  for (const endpoint of endpoints) {
    const spentMs = Math.round(now() - startedAt);
    const remaining: RetryPolicy =
      policy.timeoutMs === "unbounded"
        ? policy
        : { ...policy, timeoutMs: Math.max(0, policy.timeoutMs - spentMs) };

    const outcome = await waitForEndpoint(endpoint, remaining, { ...opts, now });
    attempts += outcome.attempts;

    if (outcome.status === "timed_out") {
      return { status: "timed_out", attempts, elapsedMs: Math.round(now() - startedAt), endpoint };
    }
  }

  return { status: "ready", attempts, elapsedMs: Math.round(now() - startedAt) };
}
