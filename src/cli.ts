import { runGate } from "./bootstrap/run_gate";
import { loadGateConfig } from "./config/gate_config";
import type { GateConfig, GateLogger } from "./contracts/gate";
import { isGateError } from "./gates/gate_error";
import type { SignalTarget } from "./launch/launcher";
import type { WaitOptions } from "./readiness/wait_for_endpoint";

const ABORT_SIGNALS: NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

type CliOptions = {
  env: NodeJS.ProcessEnv;
  argv: string[];
  log: GateLogger;
  signalTarget?: SignalTarget;
  waitOptions?: Omit<WaitOptions, "log" | "signal">;
};

/**
 * Config, wait, launch. Resolves with the exit code for the gate process.
 */
export async function runCli(opts: CliOptions): Promise<number> {
  const { log } = opts;
  const signalTarget: SignalTarget = opts.signalTarget ?? process;

  let config: GateConfig;
  try {
    config = loadGateConfig({ env: opts.env, argv: opts.argv });
  } catch (error) {
    if (isGateError(error)) {
      log.error({ evt: "gate.config_invalid", ...error.toJSON() }, "gate.config_invalid");
      return error.exitCode;
    }
    throw error;
  }

  // Termination during the wait ends it; once launched, the launcher forwards signals instead.
  const controller = new AbortController();
  const handlers = ABORT_SIGNALS.map((signal) => {
    const onSignal = () => {
      if (!controller.signal.aborted) {
        log.info({ evt: "gate.signal", signal }, "gate.signal");
        controller.abort(signal);
      }
    };
    signalTarget.on(signal, onSignal);
    return { signal, onSignal };
  });

  let attached = true;
  const detach = () => {
    if (!attached) return;
    attached = false;
    for (const { signal, onSignal } of handlers) {
      signalTarget.off(signal, onSignal);
    }
  };

  try {
    return await runGate(config, {
      log,
      signal: controller.signal,
      signalTarget,
      beforeLaunch: detach,
      ...(opts.waitOptions ? { waitOptions: opts.waitOptions } : {}),
    });
  } finally {
    detach();
  }
}
