import { createConnection } from "node:net";

import type { Endpoint } from "../contracts/gate";

export type ProbeSocket = {
  once(event: "connect", listener: () => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
  destroy(): void;
};

export type ConnectImpl = (port: number, host: string) => ProbeSocket;

export type ProbeOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
  connectImpl?: ConnectImpl;
  onFailure?: (reason: string) => void;
};

const defaultConnect: ConnectImpl = (port, host) => createConnection({ port, host });

const abortError = () => {
  const error = new Error("The operation was aborted");
  error.name = "AbortError";
  return error;
};

/**
 * Single TCP connect attempt. Resolves true once the peer accepts, false on any
 * connection error or when timeoutMs elapses. The socket is destroyed on every path.
 */
export function probeEndpoint(endpoint: Endpoint, opts: ProbeOptions): Promise<boolean> {
  const connect = opts.connectImpl ?? defaultConnect;

  if (opts.signal?.aborted) {
    return Promise.reject(abortError());
  }

  return new Promise<boolean>((resolve, reject) => {
    let settled = false;
    const socket = connect(endpoint.port, endpoint.host);

    const finish = (result: { ok: boolean; reason?: string } | { aborted: true }) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      opts.signal?.removeEventListener("abort", onAbort);
      socket.destroy();

      if ("aborted" in result) {
        reject(abortError());
        return;
      }
      if (!result.ok && result.reason) {
        opts.onFailure?.(result.reason);
      }
      resolve(result.ok);
    };

    const onAbort = () => finish({ aborted: true });
    const timer = setTimeout(
      () => finish({ ok: false, reason: `connect timeout after ${opts.timeoutMs}ms` }),
      opts.timeoutMs
    );

    opts.signal?.addEventListener("abort", onAbort, { once: true });
    socket.once("connect", () => finish({ ok: true }));
    socket.once("error", (err) => finish({ ok: false, reason: err.message }));
  });
}
