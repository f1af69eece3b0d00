import { mkdtemp, readFile, readdir, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { FilePersistence, isBatchStore } from "../../../src/services/persistence";
import type { Sender, TelemetryItem } from "../../../src/types";
import { createFakePersistence, createMockLogger } from "../../setup";

function item(sessionId: string): TelemetryItem {
  return {
    time: "2026-03-02T09:00:00.000Z",
    context: {
      appIdentifier: "test-app",
      appVersion: null,
      sdkVersion: "0.1.0",
      sessionId,
      sessionIsFirst: true,
    },
    data: {
      baseData: { baseType: "SessionStateData", envelopeName: "Telemetry.SessionState" },
      baseType: "SessionStateData",
      qualifiedName: "Telemetry.SessionState",
    },
  };
}

describe("FilePersistence", () => {
  let dataDir: string;
  let sender: Sender & { triggerSending: ReturnType<typeof vi.fn> };
  let persistence: FilePersistence;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), "telemetry-test-"));
    sender = {
      setPersistence: vi.fn(),
      setCustomServerURL: vi.fn(),
      triggerSending: vi.fn(),
    };
    persistence = new FilePersistence({ dataDir }, sender, createMockLogger());
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  test("writes a batch as JSON lines and nudges the sender", async () => {
    const batchPath = await persistence.persist([item("session-a"), item("session-b")]);

    expect(batchPath).not.toBeNull();
    expect(batchPath?.startsWith(join(dataDir, "telemetry"))).toBe(true);
    expect(batchPath?.endsWith(".jsonl")).toBe(true);

    const lines = (await readFile(batchPath ?? "", "utf-8")).split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1] ?? "").context.sessionId).toBe("session-b");
    expect(sender.triggerSending).toHaveBeenCalledTimes(1);
  });

  test("leaves no temp files behind", async () => {
    await persistence.persist([item("session-a")]);

    const entries = await readdir(join(dataDir, "telemetry"));
    expect(entries).toHaveLength(1);
    expect(entries[0]?.endsWith(".jsonl")).toBe(true);
  });

  test("ignores an empty batch", async () => {
    expect(await persistence.persist([])).toBeNull();
    expect(sender.triggerSending).not.toHaveBeenCalled();
  });

  test("reserves a batch until it is made available again", async () => {
    const batchPath = await persistence.persist([item("session-a")]);

    expect(await persistence.nextAvailableBatch()).toBe(batchPath);
    expect(await persistence.nextAvailableBatch()).toBeNull();

    persistence.makeAvailable(batchPath ?? "");
    expect(await persistence.nextAvailableBatch()).toBe(batchPath);
  });

  test("load returns the stored body", async () => {
    const batchPath = await persistence.persist([item("session-a")]);

    expect(await persistence.load(batchPath ?? "")).toBe(JSON.stringify(item("session-a")));
  });

  test("deleteBatch removes the file", async () => {
    const batchPath = await persistence.persist([item("session-a")]);
    const reserved = await persistence.nextAvailableBatch();

    await persistence.deleteBatch(reserved ?? "");

    expect(await readdir(join(dataDir, "telemetry"))).toHaveLength(0);
    expect(reserved).toBe(batchPath);
    expect(await persistence.nextAvailableBatch()).toBeNull();
  });

  test("no batches before anything was written", async () => {
    expect(await persistence.nextAvailableBatch()).toBeNull();
  });

  test("isBatchStore tells batch stores from plain persistence", () => {
    expect(isBatchStore(persistence)).toBe(true);
    expect(isBatchStore(createFakePersistence())).toBe(false);
  });
});
