import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runAction } from "../src/action.js";
import { getRecord } from "../src/db/records.js";
import { EngineUnavailableError, UnsupportedEventError } from "../src/errors.js";
import type { Runtime } from "../src/runtime.js";
import { createFakeEngine, createTestRuntime, succeedAll } from "./helpers/fixtures.js";

const payload = {
  action: "opened",
  repository: { full_name: "acme/widgets" },
  pull_request: {
    number: 12,
    title: "Add retry to uploader",
    body: "Retries failed uploads twice.",
    updated_at: "2026-01-15T09:59:00Z"
  }
};

describe("runAction", () => {
  let dir: string;
  let runtime: Runtime | undefined;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tollgate-action-"));
  });

  afterEach(() => {
    runtime?.close();
    runtime?.db.close();
    runtime = undefined;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const writeEvent = (content: string): string => {
    const file = path.join(dir, "event.json");
    fs.writeFileSync(file, content);
    return file;
  };

  it("admits the workflow's event and waits for its outcome", async () => {
    const engine = createFakeEngine(succeedAll(0.2));
    const rt = createTestRuntime({ engine, initialTokens: 1 });
    runtime = rt;

    const result = await runAction(rt, {
      eventPath: writeEvent(JSON.stringify(payload)),
      eventName: "pull_request"
    });

    const id = "pull_request:acme/widgets#12:opened:2026-01-15T09:59:00Z";
    expect(result.event.id).toBe(id);
    expect(result.decision).toEqual({ outcome: "admitted", batchId: expect.any(String) });
    expect(result.reports).toHaveLength(1);
    expect(result.reports[0]?.outcomes).toEqual([
      { event_id: id, status: "completed", cost: 0.2, reason: null }
    ]);
    expect(getRecord(rt.db, id)?.status).toBe("completed");
  });

  it("treats a re-run of the same event as a duplicate", async () => {
    const rt = createTestRuntime({ initialTokens: 2 });
    runtime = rt;
    const eventPath = writeEvent(JSON.stringify(payload));

    await runAction(rt, { eventPath, eventName: "pull_request" });
    const again = await runAction(rt, { eventPath, eventName: "pull_request" });

    expect(again.decision).toEqual({ outcome: "duplicate" });
    expect(again.reports).toEqual([]);
  });

  it("rejects an event file that is not JSON", async () => {
    const rt = createTestRuntime();
    runtime = rt;

    await expect(
      runAction(rt, { eventPath: writeEvent("not json"), eventName: "pull_request" })
    ).rejects.toBeInstanceOf(UnsupportedEventError);
  });

  it("surfaces an unavailable engine after returning the event to pending", async () => {
    const engine = createFakeEngine(() => {
      throw new EngineUnavailableError("executor offline");
    });
    const rt = createTestRuntime({ engine });
    runtime = rt;

    await expect(
      runAction(rt, {
        eventPath: writeEvent(JSON.stringify(payload)),
        eventName: "pull_request",
        deliveryId: "run-1"
      })
    ).rejects.toBeInstanceOf(EngineUnavailableError);
    expect(getRecord(rt.db, "run-1")?.status).toBe("pending");
  });
});
