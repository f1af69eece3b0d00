import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { Logger } from "pino";
import type { BatchStore } from "../../../src/services/persistence";
import { HttpSender } from "../../../src/services/sender";
import { createFakePersistence, createMockLogger } from "../../setup";

const BATCH = "/tmp/test-telemetry/telemetry/1-a.jsonl";

function createStore(batches: string[] = [BATCH]): BatchStore {
  const queue = [...batches];
  return {
    persist: vi.fn().mockResolvedValue(null),
    nextAvailableBatch: vi.fn(async () => queue.shift() ?? null),
    load: vi.fn().mockResolvedValue('{"time":"2026-03-02T09:00:00.000Z"}'),
    deleteBatch: vi.fn().mockResolvedValue(undefined),
    makeAvailable: vi.fn(),
  };
}

describe("HttpSender", () => {
  let fetchFn: ReturnType<typeof vi.fn>;
  let mockLogger: Logger;
  let sender: HttpSender;

  beforeEach(() => {
    fetchFn = vi.fn().mockResolvedValue({ ok: true, status: 200 });
    mockLogger = createMockLogger();
    sender = new HttpSender(
      { serverUrl: "https://collector.test/track", maxConcurrentRequests: 2, fetchFn },
      mockLogger
    );
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  test("posts a batch and deletes it on success", async () => {
    const store = createStore();
    sender.setPersistence(store);

    expect(await sender.send()).toBe(true);

    expect(fetchFn).toHaveBeenCalledWith("https://collector.test/track", {
      method: "POST",
      headers: { "Content-Type": "application/x-json-stream" },
      body: '{"time":"2026-03-02T09:00:00.000Z"}',
    });
    expect(store.deleteBatch).toHaveBeenCalledWith(BATCH);
    expect(store.makeAvailable).not.toHaveBeenCalled();
  });

  test("releases the batch when the server rejects it", async () => {
    fetchFn.mockResolvedValue({ ok: false, status: 503 });
    const store = createStore();
    sender.setPersistence(store);

    expect(await sender.send()).toBe(false);

    expect(store.makeAvailable).toHaveBeenCalledWith(BATCH);
    expect(store.deleteBatch).not.toHaveBeenCalled();
    expect(mockLogger.warn).toHaveBeenCalledWith(
      { status: 503, batchPath: BATCH },
      "Batch rejected by server"
    );
  });

  test("releases the batch when the request fails", async () => {
    fetchFn.mockRejectedValue(new Error("ECONNREFUSED"));
    const store = createStore();
    sender.setPersistence(store);

    expect(await sender.send()).toBe(false);

    expect(store.makeAvailable).toHaveBeenCalledWith(BATCH);
  });

  test("does nothing without stored batches", async () => {
    sender.setPersistence(createStore([]));

    expect(await sender.send()).toBe(false);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  test("does nothing without persistence", async () => {
    expect(await sender.send()).toBe(false);

    sender.triggerSending();
    expect(mockLogger.debug).toHaveBeenCalledWith("No persistence attached, skipping send");
  });

  test("warns about persistence that can't list batches", () => {
    sender.setPersistence(createFakePersistence());

    expect(mockLogger.warn).toHaveBeenCalledWith(
      "Persistence does not expose stored batches; nothing will be sent"
    );
  });

  test("posts to a custom server URL", async () => {
    sender.setPersistence(createStore());

    sender.setCustomServerURL("https://self-hosted.test/collect");
    await sender.send();

    expect(sender.getServerURL()).toBe("https://self-hosted.test/collect");
    expect(fetchFn.mock.calls[0]?.[0]).toBe("https://self-hosted.test/collect");
  });

  test("triggerSending keeps going until the store is empty", async () => {
    const store = createStore([BATCH, "/tmp/test-telemetry/telemetry/2-b.jsonl"]);
    sender.setPersistence(store);

    sender.triggerSending();

    await vi.waitFor(() => expect(store.nextAvailableBatch).toHaveBeenCalledTimes(3));
    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(store.deleteBatch).toHaveBeenCalledTimes(2);
  });

  test("triggerSending respects the request limit", async () => {
    let release: () => void = () => {};
    fetchFn.mockReturnValue(
      new Promise((resolve) => {
        release = () => resolve({ ok: false, status: 500 });
      })
    );
    const store = createStore([BATCH, "/tmp/b.jsonl", "/tmp/c.jsonl"]);
    sender.setPersistence(store);

    sender.triggerSending();
    sender.triggerSending();
    sender.triggerSending();

    await vi.waitFor(() => expect(fetchFn).toHaveBeenCalledTimes(2));
    expect(mockLogger.debug).toHaveBeenCalledWith({ activeRequests: 2 }, "Request limit reached");

    release();
    await vi.waitFor(() => expect(store.makeAvailable).toHaveBeenCalledTimes(2));
  });
});
