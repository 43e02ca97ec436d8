import { constants } from "node:os";

export type GateErrorCode =
  | "configuration_error"
  | "timed_out"
  | "launch_failure"
  | "schema_failure"
  | "aborted";

export const EXIT_CODES = {
  schema_failure: 70,
  timed_out: 75,
  configuration_error: 78,
  launch_not_executable: 126,
  launch_not_found: 127,
} as const;

export interface GateErrorDetails {
  code: GateErrorCode;
  message: string;
  exitCode: number;
  endpoint?: string;
  command?: string;
  issues?: string[];
  cause?: string;
}

export class GateError extends Error {
  public readonly code: GateErrorCode;
  public readonly exitCode: number;
  public readonly details: GateErrorDetails;

  constructor(details: GateErrorDetails) {
    super(details.message);
    this.name = "GateError";
    this.code = details.code;
    this.exitCode = details.exitCode;
    this.details = details;
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      exitCode: this.exitCode,
      details: {
        ...this.details,
        // Bounded for log lines
        cause: this.details.cause?.substring(0, 200),
      },
    };
  }
}

export const isGateError = (error: unknown): error is GateError => error instanceof GateError;

export const isAbortError = (error: unknown): boolean =>
  error instanceof Error && error.name === "AbortError";

/**
 * Shell convention for a process ended by a signal: 128 + signal number.
 * Anything that is not a known signal name maps to 1.
 */
export function exitCodeForSignal(signal: unknown): number {
  if (typeof signal !== "string") return 1;
  const match = Object.entries(constants.signals).find(([name]) => name === signal);
  return match ? 128 + Number(match[1]) : 1;
}
