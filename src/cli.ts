#!/usr/bin/env node
import { Command, Option } from "commander";
import fs from "node:fs";
import path from "node:path";
import { runAction } from "./action.js";
import { getDefaultConfig, getWebhookConfig, loadEngineConfig, type EngineConfig } from "./config.js";
import { openDatabase, withStore, type DatabaseClient } from "./db/client.js";
import { getRecord, listRecords, reconcileInFlight, resubmitRecord } from "./db/records.js";
import { EVENT_TYPES, RECORD_STATUSES, type EventType, type RecordStatus } from "./db/types.js";
import { createCommandEngine } from "./engine/command.js";
import { describeError } from "./errors.js";
import { makeLogger } from "./logger.js";
import { createRuntime, type RunKind, type Runtime } from "./runtime.js";
import { startServer } from "./server.js";

const program = new Command();

const ensureDataDir = (dataDir: string) => {
  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
  }
};

const print = (value: unknown) => {
  process.stdout.write(JSON.stringify(value, null, 2));
  process.stdout.write("\n");
};

const fail = (message: string): never => {
  process.stderr.write(`${message}\n`);
  process.exit(1);
};

const loadConfig = (): EngineConfig => {
  const { config: explicit } = program.opts<{ config?: string }>();
  const app = getDefaultConfig();
  return loadEngineConfig(explicit ?? app.configPath, { required: Boolean(explicit) });
};

const openDb = (): DatabaseClient => {
  const config = getDefaultConfig();
  ensureDataDir(path.dirname(config.dbPath));
  return openDatabase({ path: config.dbPath });
};

const openRuntime = (kind: RunKind = "bot"): Runtime => {
  const config = loadConfig();
  const db = openDb();
  const engine = createCommandEngine({
    command: config.dispatch.command,
    mode: config.dispatch.mode
  });
  return createRuntime({
    db,
    config,
    engine,
    logger: makeLogger(),
    kind
  });
};

const parsePositive = (name: string) => (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fail(`${name} must be a positive number, got "${value}"`);
  }
  return parsed;
};

/** Runs a command body, printing any failure to stderr and exiting 1. */
const guarded =
  <A extends unknown[]>(task: (...args: A) => Promise<void> | void) =>
  async (...args: A): Promise<void> => {
    try {
      await task(...args);
    } catch (error) {
      fail(describeError(error));
    }
  };

program
  .name("tollgate")
  .description("Cost-aware admission and batching for repository automation events")
  .version("0.1.0")
  .option("--config <path>", "policy file (YAML)");

program
  .command("action")
  .description("Admit and process the event of the current workflow run")
  .option("--event-path <path>", "event payload file", process.env.GITHUB_EVENT_PATH)
  .option("--event-name <name>", "event name", process.env.GITHUB_EVENT_NAME)
  .option("--delivery-id <id>", "explicit event id")
  .action(
    guarded(async (options: { eventPath?: string; eventName?: string; deliveryId?: string }) => {
      if (!options.eventPath || !options.eventName) {
        fail("GITHUB_EVENT_PATH and GITHUB_EVENT_NAME (or --event-path/--event-name) are required");
        return;
      }
      const runtime = openRuntime("action");
      try {
        const result = await runAction(runtime, {
          eventPath: options.eventPath,
          eventName: options.eventName,
          deliveryId: options.deliveryId ?? null
        });
        print({ event_id: result.event.id, decision: result.decision, reports: result.reports });
      } finally {
        runtime.close();
        runtime.db.close();
      }
    })
  );

program
  .command("bot")
  .description("Serve webhook deliveries and sweep deferred work on a schedule")
  .option("--port <port>", "listen port", parsePositive("--port"))
  .action(
    guarded(async (options: { port?: number }) => {
      const webhook = getWebhookConfig();
      const runtime = openRuntime("bot");
      const bot = await startServer(runtime, {
        ...webhook,
        port: options.port ?? webhook.port
      });

      const shutdown = () => {
        bot
          .close()
          .then(() => {
            runtime.db.close();
            process.exit(0);
          })
          .catch((error: unknown) => fail(describeError(error)));
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    })
  );

program
  .command("sweep")
  .description("Re-evaluate deferred events once and wait for the dispatched batches")
  .action(
    guarded(async () => {
      const runtime = openRuntime("sweep");
      try {
        const recovery = await runtime.controller.recover();
        await runtime.controller.flushAll();
        const reports = await runtime.controller.drain();
        print({ ...recovery, reports });
      } finally {
        runtime.close();
        runtime.db.close();
      }
    })
  );

program
  .command("stats")
  .description("Print the spend and queue snapshot")
  .action(
    guarded(() => {
      const runtime = openRuntime();
      try {
        print(runtime.snapshot());
      } finally {
        runtime.close();
        runtime.db.close();
      }
    })
  );

const recordsCommand = program.command("records").description("Inspect processing records");

recordsCommand
  .command("list")
  .description("List processing records, newest first")
  .addOption(new Option("--status <status>", "record status").choices([...RECORD_STATUSES]))
  .addOption(new Option("--type <type>", "event type").choices([...EVENT_TYPES]))
  .option("--limit <n>", "maximum rows", parsePositive("--limit"), 100)
  .action(
    guarded((options: { status?: RecordStatus; type?: EventType; limit: number }) => {
      const db = openDb();
      try {
        print(
          withStore(db, "list records", () =>
            listRecords(db, { status: options.status, type: options.type, limit: options.limit })
          )
        );
      } finally {
        db.close();
      }
    })
  );

recordsCommand
  .command("show")
  .description("Show one processing record")
  .argument("<id>", "event id")
  .action(
    guarded((id: string) => {
      const db = openDb();
      try {
        const record = withStore(db, "read record", () => getRecord(db, id));
        if (!record) {
          fail(`Record not found: ${id}`);
        }
        print(record);
      } finally {
        db.close();
      }
    })
  );

program
  .command("resubmit")
  .description("Return a failed event to pending for the next sweep")
  .argument("<id>", "event id")
  .action(
    guarded((id: string) => {
      const db = openDb();
      try {
        const record = withStore(db, "resubmit record", () => resubmitRecord(db, id, Date.now()));
        if (!record) {
          fail(`No failed record with id ${id}`);
        }
        print(record);
      } finally {
        db.close();
      }
    })
  );

program
  .command("reconcile")
  .description("Mark in-flight records left by a crashed run as failed")
  .option("--older-than-minutes <n>", "age threshold", parsePositive("--older-than-minutes"))
  .action(
    guarded((options: { olderThanMinutes?: number }) => {
      const config = loadConfig();
      const db = openDb();
      try {
        const now = Date.now();
        const age =
          options.olderThanMinutes !== undefined
            ? options.olderThanMinutes * 60_000
            : config.dispatch.reconcileAfterMs;
        const reconciled = withStore(db, "reconcile in-flight records", () =>
          reconcileInFlight(db, { olderThan: now - age, now })
        );
        print({ reconciled });
      } finally {
        db.close();
      }
    })
  );

program
  .command("retention")
  .description("Delete finished records and cost entries past the retention horizon")
  .option("--horizon-days <n>", "retention horizon", parsePositive("--horizon-days"))
  .action(
    guarded((options: { horizonDays?: number }) => {
      const runtime = openRuntime();
      try {
        print(runtime.retention.sweep(Date.now(), options.horizonDays));
      } finally {
        runtime.close();
        runtime.db.close();
      }
    })
  );

program.parseAsync().catch((error: unknown) => fail(describeError(error)));
