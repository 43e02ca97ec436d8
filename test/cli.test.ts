import { describe, it, expect, afterEach } from "vitest";
import { EventEmitter } from "node:events";
import { createServer, type Server } from "node:net";

import { runCli } from "../src/cli";
import { makeLogger } from "./helpers/logger";

const node = process.execPath;

const listen = (): Promise<Server> =>
  new Promise((resolve) => {
    const server = createServer((socket) => socket.end());
    server.listen(0, "127.0.0.1", () => resolve(server));
  });

const portOf = (server: Server): number => {
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server not listening on tcp");
  return address.port;
};

const close = (server: Server): Promise<void> =>
  new Promise((resolve) => server.close(() => resolve()));

describe("runCli", () => {
  let server: Server | null = null;

  afterEach(async () => {
    if (server) {
      await close(server);
      server = null;
    }
  });

  it("exits 78 on invalid configuration without touching signals", async () => {
    const { log, entries } = makeLogger();
    const target = new EventEmitter();

    const code = await runCli({ env: { DB_HOST: "db" }, argv: ["--", node], log, signalTarget: target });

    expect(code).toBe(78);
    expect(entries.at(-1)?.message).toBe("gate.config_invalid");
    expect(target.eventNames()).toEqual([]);
  });

  it("waits for the dependency from env and launches the argv command", async () => {
    const { log } = makeLogger();
    const target = new EventEmitter();
    server = await listen();

    const code = await runCli({
      env: { DB_HOST: "127.0.0.1", DB_PORT: String(portOf(server)), GATE_CHILD_CODE: "4" },
      argv: ["--", node, "-e", "process.exit(Number(process.env.GATE_CHILD_CODE))"],
      log,
      signalTarget: target,
    });

    expect(code).toBe(4);
    expect(target.eventNames()).toEqual([]);
  });

  it("hands signals to the launcher once the service is starting", async () => {
    const { log, entries } = makeLogger();
    const target = new EventEmitter();
    server = await listen();

    const running = runCli({
      env: { DB_HOST: "127.0.0.1", DB_PORT: String(portOf(server)) },
      argv: ["--", node, "-e", "setInterval(() => {}, 1000)"],
      log,
      signalTarget: target,
    });
    // Deliver the signal only once the service has been spawned
    const poll = setInterval(() => {
      if (entries.some((entry) => entry.message === "gate.launch.started")) {
        clearInterval(poll);
        target.emit("SIGTERM");
      }
    }, 10);

    await expect(running).resolves.toBe(143);
    expect(entries.some((entry) => entry.message === "gate.launch.signal_forwarded")).toBe(true);
    expect(entries.some((entry) => entry.message === "gate.signal")).toBe(false);
    expect(target.eventNames()).toEqual([]);
  });

  it("exits 128 + signo when terminated during the wait", async () => {
    const { log, entries } = makeLogger();
    const target = new EventEmitter();
    const closed = await listen();
    const port = portOf(closed);
    await close(closed);

    const running = runCli({
      env: {
        DB_HOST: "127.0.0.1",
        DB_PORT: String(port),
        WAIT_INTERVAL_SECONDS: "60",
        WAIT_TIMEOUT_SECONDS: "unbounded",
      },
      argv: ["--", node, "-e", "process.exit(0)"],
      log,
      signalTarget: target,
    });
    setTimeout(() => target.emit("SIGINT"), 100);

    await expect(running).resolves.toBe(130);
    expect(entries.some((entry) => entry.message === "gate.signal")).toBe(true);
    expect(entries.some((entry) => entry.message === "gate.launch.started")).toBe(false);
    expect(target.eventNames()).toEqual([]);
  });
});
