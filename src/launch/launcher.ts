import { spawn, type ChildProcess, type SpawnOptions } from "node:child_process";

import type { GateLogger, LaunchSpec } from "../contracts/gate";
import { EXIT_CODES, GateError, exitCodeForSignal } from "../gates/gate_error";

export const FORWARDED_SIGNALS: NodeJS.Signals[] = ["SIGTERM", "SIGINT", "SIGHUP", "SIGQUIT", "SIGUSR2"];

export type SignalTarget = {
  on: (signal: NodeJS.Signals, listener: () => void) => unknown;
  off: (signal: NodeJS.Signals, listener: () => void) => unknown;
};

type SpawnImpl = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export type LaunchOptions = {
  log: GateLogger;
  spawnImpl?: SpawnImpl;
  signalTarget?: SignalTarget;
};

const launchFailure = (spec: LaunchSpec, error: NodeJS.ErrnoException) => {
  const notExecutable = error.code === "EACCES" || error.code === "EPERM";
  return new GateError({
    code: "launch_failure",
    message: notExecutable
      ? `Launch target is not executable: ${spec.command}`
      : `Launch target not found: ${spec.command}`,
    exitCode: notExecutable ? EXIT_CODES.launch_not_executable : EXIT_CODES.launch_not_found,
    command: spec.command,
    cause: error.message,
  });
};

/**
 * Hands control to the service process. The child shares stdio with the gate,
 * receives every forwarded signal, and its exit status becomes the gate's.
 * Resolves with the exit code the gate should exit with; rejects with a
 * launch_failure GateError when the executable cannot be started.
 */
export function launch(spec: LaunchSpec, opts: LaunchOptions): Promise<number> {
  const spawnImpl: SpawnImpl = opts.spawnImpl ?? spawn;
  const signalTarget: SignalTarget = opts.signalTarget ?? process;

  return new Promise<number>((resolve, reject) => {
    let started = false;
    let settled = false;
    const child = spawnImpl(spec.command, spec.args, {
      env: spec.env,
      stdio: "inherit",
    });

    const forwarders = FORWARDED_SIGNALS.map((signal) => {
      const forward = () => {
        opts.log.info({ evt: "gate.launch.signal_forwarded", signal, pid: child.pid }, "gate.launch.signal_forwarded");
        child.kill(signal);
      };
      signalTarget.on(signal, forward);
      return { signal, forward };
    });

    const detach = () => {
      for (const { signal, forward } of forwarders) {
        signalTarget.off(signal, forward);
      }
    };

    child.once("spawn", () => {
      started = true;
      opts.log.info(
        { evt: "gate.launch.started", command: spec.command, args: spec.args, pid: child.pid },
        "gate.launch.started"
      );
    });

    child.on("error", (error: NodeJS.ErrnoException) => {
      if (settled) return;
      if (started) {
        // kill() failures after start are reported but do not end the handoff
        opts.log.warn({ evt: "gate.launch.child_error", error: error.message }, "gate.launch.child_error");
        return;
      }
      settled = true;
      detach();
      opts.log.error(
        { evt: "gate.launch.failed", command: spec.command, code: error.code, error: error.message },
        "gate.launch.failed"
      );
      reject(launchFailure(spec, error));
    });

    child.once("exit", (code, signal) => {
      if (settled) return;
      settled = true;
      detach();
      const exitCode = code ?? exitCodeForSignal(signal);
      opts.log.info({ evt: "gate.launch.exited", code, signal, exitCode }, "gate.launch.exited");
      resolve(exitCode);
    });
  });
}
