import { Server } from "http";
import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { createApp } from "./app";
import { firewallEnabled } from "./controllers/systemController";
import { LogStream } from "./services/logEvents";
import { OperationRegistry } from "./services/operationRegistry";
import { Orchestrator } from "./services/orchestrator";
import { ProgressBroadcaster } from "./services/progressBroadcaster";
import { ScanDriver } from "./services/scan/scanDriver";
import {
  fakeRunner,
  nmapOutput,
  ScriptedRemediation,
  testCatalog,
} from "./testing/fakes";

const UNKNOWN_ID = "00000000-0000-4000-8000-000000000000";

interface Running {
  baseUrl: string;
  server: Server;
  orchestrator: Orchestrator;
  registry: OperationRegistry;
  broadcaster: ProgressBroadcaster;
  remediation: ScriptedRemediation;
  logStream: LogStream;
}

async function startApp(apiKey = ""): Promise<Running> {
  const fake = fakeRunner((line) =>
    line.startsWith("nmap -p- --open") ? { stdout: nmapOutput([21, 22, 80]) } : undefined,
  );
  const catalog = testCatalog();
  const registry = new OperationRegistry();
  const broadcaster = new ProgressBroadcaster();
  const remediation = new ScriptedRemediation(catalog);
  const logStream = new LogStream();
  const orchestrator = new Orchestrator({
    registry,
    broadcaster,
    scanDriver: new ScanDriver({ tool: "nmap", timeoutMs: 5000, runner: fake.runner }),
    remediation,
    catalog,
    options: { maxAttempts: 1, verifyDelayMs: 0 },
  });

  const app = createApp({
    orchestrator,
    registry,
    broadcaster,
    system: { platform: { kind: "linux" }, elevated: false, runner: fake.runner },
    logStream,
    apiKey,
    corsOrigin: ["http://localhost:5173"],
    rateLimitPerMinute: 1000,
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server is not listening on a TCP port");
  }
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    server,
    orchestrator,
    registry,
    broadcaster,
    remediation,
    logStream,
  };
}

async function stopApp(running: Running): Promise<void> {
  await running.orchestrator.idle();
  const closed = new Promise<void>((resolve) => running.server.close(() => resolve()));
  running.server.closeAllConnections();
  await closed;
}

async function readBody(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  if (typeof body !== "object" || body === null) {
    throw new Error("expected a JSON object");
  }
  return Object.fromEntries(Object.entries(body));
}

function post(url: string, body: unknown, headers: Record<string, string> = {}) {
  return fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
  });
}

describe("HTTP API", () => {
  let app: Running;

  beforeAll(async () => {
    app = await startApp();
  });

  afterAll(async () => {
    await stopApp(app);
  });

  it("answers the root and health probes", async () => {
    const root = await fetch(`${app.baseUrl}/`);
    expect(await root.json()).toEqual({ name: "port-warden", version: "1.0.0" });

    const health = await fetch(`${app.baseUrl}/health`);
    const body = await readBody(health);
    expect(health.status).toBe(200);
    expect(body.status).toBe("healthy");
    expect(typeof body.timestamp).toBe("string");
  });

  it("reports system status", async () => {
    const res = await fetch(`${app.baseUrl}/system/status`);
    const body = await readBody(res);

    expect(body).toMatchObject({
      admin_privileges: false,
      operating_system: "linux",
      firewall_enabled: null,
    });
  });

  it("starts a scan and exposes it as an operation", async () => {
    const res = await post(`${app.baseUrl}/api/scans`, {});
    const body = await readBody(res);

    expect(res.status).toBe(202);
    expect(body.status).toBe("started");
    expect(body.message).toBe("Scan started for 127.0.0.1");

    await app.orchestrator.idle();
    const op = await readBody(await fetch(`${app.baseUrl}/api/operations/${String(body.operation_id)}`));
    expect(op).toMatchObject({ status: "completed", result: { vulnerable_count: 2 } });
  });

  it("starts an automated scan", async () => {
    const res = await post(`${app.baseUrl}/api/scans`, { target: "localhost", automated_mode: true });
    const body = await readBody(res);

    expect(res.status).toBe(202);
    expect(body.message).toBe("Automated scan started for localhost");
    await app.orchestrator.idle();
    expect(app.registry.require(String(body.operation_id)).context).toEqual({
      kind: "scan",
      target: "localhost",
      automated_mode: true,
    });
  });

  it("validates scan requests", async () => {
    const flag = await post(`${app.baseUrl}/api/scans`, { target: "-oX" });
    expect(flag.status).toBe(400);
    expect(await readBody(flag)).toEqual({
      errors: [expect.objectContaining({ path: "target" })],
    });

    const mode = await post(`${app.baseUrl}/api/scans`, { automated_mode: "yes" });
    expect(mode.status).toBe(400);
  });

  it("rejects malformed JSON", async () => {
    const res = await fetch(`${app.baseUrl}/api/scans`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{",
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Malformed JSON body" });
  });

  it("runs remediation actions", async () => {
    const res = await post(`${app.baseUrl}/api/actions`, {
      port: "21",
      service: "FTP",
      action: "close",
    });
    const body = await readBody(res);

    expect(res.status).toBe(202);
    expect(body.message).toBe("close started for port 21");
    await app.orchestrator.idle();
    expect(app.registry.require(String(body.operation_id)).status).toBe("completed");
  });

  it("validates action requests", async () => {
    const badAction = await post(`${app.baseUrl}/api/actions`, {
      port: 21,
      service: "FTP",
      action: "nuke",
    });
    expect(badAction.status).toBe(400);

    const badPort = await post(`${app.baseUrl}/api/actions`, {
      port: 70000,
      service: "FTP",
      action: "close",
    });
    expect(badPort.status).toBe(400);
  });

  it("answers 404 for an unknown parent operation", async () => {
    const res = await post(`${app.baseUrl}/api/actions`, {
      port: 21,
      service: "FTP",
      action: "close",
      operation_id: UNKNOWN_ID,
    });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: "Operation not found",
      code: "OPERATION_NOT_FOUND",
    });
  });

  it("rolls back failed operations only", async () => {
    const missing = await post(`${app.baseUrl}/api/rollback`, { operation_id: UNKNOWN_ID, port: 21 });
    expect(missing.status).toBe(404);
    const malformed = await post(`${app.baseUrl}/api/rollback`, { operation_id: "scan-7", port: 21 });
    expect(malformed.status).toBe(404);
    const blank = await post(`${app.baseUrl}/api/rollback`, { operation_id: "", port: 21 });
    expect(blank.status).toBe(400);

    app.remediation.setOutcomes(22, [false]);
    const failedId = app.orchestrator.executeAction(22, "SSH", "close");
    const doneId = app.orchestrator.executeAction(21, "FTP", "close");
    await app.orchestrator.idle();

    const conflict = await post(`${app.baseUrl}/api/rollback`, { operation_id: doneId, port: 21 });
    expect(conflict.status).toBe(409);
    expect((await readBody(conflict)).code).toBe("INVALID_TRANSITION");

    const accepted = await post(`${app.baseUrl}/api/rollback`, { operation_id: failedId, port: 22 });
    const body = await readBody(accepted);
    expect(accepted.status).toBe(202);
    expect(body.message).toBe("Rollback started for port 22");
    await app.orchestrator.idle();
    expect(app.registry.require(String(body.rollback_id)).kind).toBe("rollback");
  });

  it("lists, filters, fetches and deletes operations", async () => {
    const scanId = app.orchestrator.startScan("127.0.0.1", false);
    await app.orchestrator.idle();

    const scans = await readBody(await fetch(`${app.baseUrl}/api/operations?kind=scan`));
    expect(scans.operations).toHaveProperty(scanId);
    expect(scans.operations).toEqual(JSON.parse(JSON.stringify(app.registry.list({ kind: "scan" }))));

    const bogus = await fetch(`${app.baseUrl}/api/operations?kind=bogus`);
    expect(bogus.status).toBe(400);

    const malformed = await fetch(`${app.baseUrl}/api/operations/not-a-uuid`);
    expect(malformed.status).toBe(404);
    expect(await malformed.json()).toEqual({ error: "Operation not found" });
    const malformedDelete = await fetch(`${app.baseUrl}/api/operations/not-a-uuid`, { method: "DELETE" });
    expect(malformedDelete.status).toBe(404);
    expect((await fetch(`${app.baseUrl}/api/operations/${UNKNOWN_ID}`)).status).toBe(404);

    const removed = await fetch(`${app.baseUrl}/api/operations/${scanId}`, { method: "DELETE" });
    expect(await removed.json()).toEqual({ message: "Operation deleted" });
    const again = await fetch(`${app.baseUrl}/api/operations/${scanId}`, { method: "DELETE" });
    expect(again.status).toBe(404);
  });

  it("serves recent logs from the buffer", async () => {
    app.logStream.emitLog("INFO", "port-warden", "one");
    app.logStream.emitLog("WARN", "port-warden", "two");
    app.logStream.emitLog("ERROR", "port-warden", "three");

    const body = await readBody(await fetch(`${app.baseUrl}/api/logs/recent?count=2`));

    expect(body.count).toBe(2);
    expect(body.logs).toMatchObject([{ message: "two" }, { message: "three" }]);
  });

  it("filters recent logs by level and rejects unknown levels", async () => {
    app.logStream.clearBuffer();
    app.logStream.emitLog("INFO", "port-warden", "started");
    app.logStream.emitLog("ERROR", "port-warden", "crashed");

    const body = await readBody(await fetch(`${app.baseUrl}/api/logs/recent?level=error`));
    expect(body.logs).toMatchObject([{ message: "crashed" }]);

    const bad = await fetch(`${app.baseUrl}/api/logs/recent?level=loud`);
    expect(bad.status).toBe(400);
  });

  it("answers 404 for unknown routes", async () => {
    const res = await fetch(`${app.baseUrl}/api/nothing-here`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found" });
  });

  it("streams progress events over SSE", async () => {
    const res = await fetch(`${app.baseUrl}/api/events`);
    expect(res.headers.get("content-type")).toBe("text/event-stream");
    if (!res.body) {
      throw new Error("no response body");
    }
    const reader = res.body.getReader();
    const decoder = new TextDecoder();
    let text = "";
    const readUntil = async (marker: string): Promise<void> => {
      while (!text.includes(marker)) {
        const { value, done } = await reader.read();
        if (done) {
          throw new Error(`stream ended before ${marker}`);
        }
        text += decoder.decode(value, { stream: true });
      }
    };

    await readUntil("event: connected");
    expect(app.broadcaster.subscriberCount()).toBe(1);

    const id = app.orchestrator.executeAction(21, "FTP", "close");
    await readUntil("event: action_complete");
    await reader.cancel();

    const block = text.split("\n\n").find((b) => b.startsWith("event: action_complete"));
    if (!block) {
      throw new Error("no completion block");
    }
    const data = JSON.parse(block.split("\n")[1].slice("data: ".length));
    expect(data).toMatchObject({
      type: "action_complete",
      operation_id: id,
      kind: "action",
      status: "completed",
      progress: 100,
    });
  });
});

describe("API key", () => {
  let app: Running;

  beforeAll(async () => {
    app = await startApp("test-secret");
  });

  afterAll(async () => {
    await stopApp(app);
  });

  it("guards routes that start work", async () => {
    const denied = await post(`${app.baseUrl}/api/scans`, {});
    expect(denied.status).toBe(401);
    expect(await denied.json()).toEqual({ error: "Invalid or missing API key" });

    const wrong = await post(`${app.baseUrl}/api/actions`, { port: 21, service: "FTP", action: "close" }, {
      "X-API-Key": "wrong",
    });
    expect(wrong.status).toBe(401);

    const allowed = await post(`${app.baseUrl}/api/scans`, {}, { "X-API-Key": "test-secret" });
    expect(allowed.status).toBe(202);
  });

  it("leaves read-only routes open", async () => {
    const res = await fetch(`${app.baseUrl}/api/operations`);
    expect(res.status).toBe(200);
  });
});

describe("firewallEnabled", () => {
  it("is null off Windows", async () => {
    const fake = fakeRunner();
    expect(await firewallEnabled({ platform: { kind: "linux" }, elevated: true, runner: fake.runner })).toBeNull();
    expect(fake.calls).toEqual([]);
  });

  it("reads netsh profile state on Windows", async () => {
    const on = fakeRunner(() => ({ stdout: "State                                 ON\r\n" }));
    const mixed = fakeRunner(() => ({ stdout: "State ON\r\nState OFF\r\n" }));

    expect(await firewallEnabled({ platform: { kind: "windows" }, elevated: true, runner: on.runner })).toBe(true);
    expect(await firewallEnabled({ platform: { kind: "windows" }, elevated: true, runner: mixed.runner })).toBe(false);
  });
});
