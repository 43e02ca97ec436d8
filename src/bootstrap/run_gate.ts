import { formatEndpoint, type GateConfig, type GateLogger, type GateState } from "../contracts/gate";
import { EXIT_CODES, exitCodeForSignal, isGateError } from "../gates/gate_error";
import { launch, type SignalTarget } from "../launch/launcher";
import { waitForEndpoints, type WaitOptions } from "../readiness/wait_for_endpoint";
import { applySchema } from "./schema_bootstrap";

type RunGateOptions = {
  log: GateLogger;
  signal?: AbortSignal;
  waitImpl?: typeof waitForEndpoints;
  launchImpl?: typeof launch;
  schemaImpl?: typeof applySchema;
  waitOptions?: Omit<WaitOptions, "log" | "signal">;
  signalTarget?: SignalTarget;
  // Runs once the wait is over, right before the service is spawned
  beforeLaunch?: () => void;
};

/**
 * waiting -> ready -> launched, or waiting -> timed_out.
 * Resolves with the exit code for the gate process and never rejects.
 */
export async function runGate(config: GateConfig, opts: RunGateOptions): Promise<number> {
  const waitImpl = opts.waitImpl ?? waitForEndpoints;
  const launchImpl = opts.launchImpl ?? launch;
  const schemaImpl = opts.schemaImpl ?? applySchema;
  const { log } = opts;

  let state: GateState = "waiting";
  const transition = (next: GateState, context: Record<string, unknown> = {}) => {
    log.info({ evt: "gate.state", from: state, to: next, ...context }, "gate.state");
    state = next;
  };

  try {
    log.info(
      {
        evt: "gate.waiting",
        endpoints: config.endpoints.map(formatEndpoint),
        intervalMs: config.policy.intervalMs,
        timeoutMs: config.policy.timeoutMs,
      },
      "gate.waiting"
    );

    const outcome = await waitImpl(config.endpoints, config.policy, {
      ...opts.waitOptions,
      log,
      signal: opts.signal,
    });

    if (outcome.status === "timed_out") {
      transition("timed_out", {
        endpoint: formatEndpoint(outcome.endpoint),
        attempts: outcome.attempts,
        elapsedMs: outcome.elapsedMs,
      });
      return EXIT_CODES.timed_out;
    }

    transition("ready", { attempts: outcome.attempts, elapsedMs: outcome.elapsedMs });

    if (config.schema) {
      schemaImpl(config.schema, log);
    }

    opts.beforeLaunch?.();
    if (opts.signal?.aborted) {
      log.info({ evt: "gate.launch.skipped", state, signal: opts.signal.reason }, "gate.launch.skipped");
      return exitCodeForSignal(opts.signal.reason);
    }

    transition("launched", { command: config.launch.command });
    return await launchImpl(config.launch, {
      log,
      ...(opts.signalTarget ? { signalTarget: opts.signalTarget } : {}),
    });
  } catch (error) {
    if (isGateError(error)) {
      log.error({ evt: "gate.failed", state, ...error.toJSON() }, "gate.failed");
      return error.exitCode;
    }
    log.error({ evt: "gate.failed", state, error: String(error) }, "gate.failed");
    return 1;
  }
}
