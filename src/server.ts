import { createHmac, timingSafeEqual } from "node:crypto";
import http, { type IncomingHttpHeaders, type IncomingMessage } from "node:http";
import type { AdmissionDecision } from "./admission.js";
import type { WebhookConfig } from "./config.js";
import {
  EngineUnavailableError,
  StoreUnavailableError,
  UnsupportedEventError,
  describeError
} from "./errors.js";
import { normalizeGithubEvent } from "./ingest.js";
import type { Runtime } from "./runtime.js";

export type WebhookRequest = {
  method: string;
  url: string;
  headers: IncomingHttpHeaders;
  body: string;
};

export type WebhookResponse = {
  status: number;
  body: unknown;
};

export type WebhookHandler = (request: WebhookRequest) => Promise<WebhookResponse>;

const MAX_BACKOFF_FACTOR = 32;

const readBody = (req: IncomingMessage): Promise<string> => {
  return new Promise((resolve, reject) => {
    let data = "";
    req.setEncoding("utf8");
    req.on("data", (chunk: string) => {
      data += chunk;
    });
    req.on("end", () => resolve(data));
    req.on("error", reject);
  });
};

const header = (headers: IncomingHttpHeaders, name: string): string | undefined => {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
};

/** Checks an `X-Hub-Signature-256` value (`sha256=<hex>`) against the raw body. */
export const verifySignature = (
  body: string,
  signature: string | undefined,
  secret: string | null
): boolean => {
  if (!secret) return true;
  if (!signature?.startsWith("sha256=")) return false;

  const expected = Buffer.from(
    `sha256=${createHmac("sha256", secret).update(body, "utf8").digest("hex")}`,
    "utf8"
  );
  const received = Buffer.from(signature, "utf8");
  if (expected.length !== received.length) return false;
  return timingSafeEqual(expected, received);
};

const error = (status: number, message: string): WebhookResponse => ({
  status,
  body: { error: message }
});

export const createWebhookHandler = (runtime: Runtime, webhook: WebhookConfig): WebhookHandler => {
  const log = runtime.logger.child({ module: "webhook" });

  const receive = async (request: WebhookRequest): Promise<WebhookResponse> => {
    if (!verifySignature(request.body, header(request.headers, "x-hub-signature-256"), webhook.secret)) {
      log.warn("rejected delivery with a bad signature");
      return error(401, "invalid_signature");
    }

    const eventName = header(request.headers, "x-github-event");
    if (!eventName) {
      return error(400, "missing X-GitHub-Event header");
    }

    let payload: unknown;
    try {
      payload = JSON.parse(request.body);
    } catch {
      return error(400, "body is not valid JSON");
    }

    const event = normalizeGithubEvent({
      eventName,
      payload,
      deliveryId: header(request.headers, "x-github-delivery"),
      receivedAt: Date.now()
    });
    const decision: AdmissionDecision = await runtime.controller.onEvent(event);
    return { status: 202, body: { event_id: event.id, decision } };
  };

  return async (request) => {
    const path = request.url.replace(/\?.*$/, "");

    try {
      if (request.method === "GET" && path === "/healthz") {
        return { status: 200, body: { status: "ok" } };
      }
      if (request.method === "GET" && path === "/stats") {
        return { status: 200, body: runtime.snapshot() };
      }
      if (path !== webhook.path) {
        return error(404, "not_found");
      }
      if (request.method !== "POST") {
        return error(405, "only POST is supported");
      }
      return await receive(request);
    } catch (caught) {
      if (caught instanceof UnsupportedEventError) {
        return error(422, caught.message);
      }
      if (caught instanceof StoreUnavailableError) {
        log.error({ err: caught }, "state store unavailable");
        return error(503, "store_unavailable");
      }
      log.error({ err: caught }, `request failed: ${describeError(caught)}`);
      return error(500, "server_error");
    }
  };
};

export type Scheduler = {
  /** One sweep pass; returns the delay before the next one. */
  tick: () => Promise<number>;
  start: () => void;
  stop: () => void;
};

export const createScheduler = (runtime: Runtime): Scheduler => {
  const log = runtime.logger.child({ module: "scheduler" });
  const baseDelay = runtime.config.batching.flushIntervalMs;
  let factor = 1;
  let sweepTimer: NodeJS.Timeout | null = null;
  let retentionTimer: NodeJS.Timeout | null = null;
  let running = false;

  const tick = async (): Promise<number> => {
    try {
      await runtime.controller.sweep();
    } catch (caught) {
      log.error({ err: caught }, `sweep failed: ${describeError(caught)}`);
    }

    const { reports, errors } = runtime.controller.settle();
    for (const report of reports) {
      log.debug({ batch_id: report.batch_id, outcomes: report.outcomes.length }, "batch reported");
    }
    const unavailable = errors.some((caught) => caught instanceof EngineUnavailableError);

    try {
      runtime.checkStaleWork();
    } catch (caught) {
      log.error({ err: caught }, `stale work check failed: ${describeError(caught)}`);
    }

    factor = unavailable ? Math.min(factor * 2, MAX_BACKOFF_FACTOR) : 1;
    if (unavailable) {
      log.warn({ delay_ms: baseDelay * factor }, "execution engine unavailable; backing off");
    }
    return baseDelay * factor;
  };

  const schedule = (delay: number) => {
    if (!running) return;
    sweepTimer = setTimeout(() => {
      tick()
        .then(schedule)
        .catch((caught: unknown) => {
          log.error({ err: caught }, "scheduler tick failed");
          schedule(baseDelay);
        });
    }, delay);
  };

  return {
    tick,
    start: () => {
      if (running) return;
      running = true;
      schedule(baseDelay);
      retentionTimer = setInterval(() => {
        try {
          runtime.retention.sweep();
        } catch (caught) {
          log.error({ err: caught }, `retention sweep failed: ${describeError(caught)}`);
        }
      }, runtime.config.retention.sweepIntervalMs);
    },
    stop: () => {
      running = false;
      if (sweepTimer) clearTimeout(sweepTimer);
      if (retentionTimer) clearInterval(retentionTimer);
      sweepTimer = null;
      retentionTimer = null;
    }
  };
};

export type BotServer = {
  server: http.Server;
  scheduler: Scheduler;
  close: () => Promise<void>;
};

export const startServer = async (runtime: Runtime, webhook: WebhookConfig): Promise<BotServer> => {
  const log = runtime.logger.child({ module: "server" });
  const handle = createWebhookHandler(runtime, webhook);
  const scheduler = createScheduler(runtime);

  const recovery = await runtime.controller.recover();
  log.info(
    { reconciled: recovery.reconciled.length, released: recovery.released },
    "recovered state from the store"
  );

  const server = http.createServer((req, res) => {
    readBody(req)
      .then((body) =>
        handle({ method: req.method ?? "GET", url: req.url ?? "/", headers: req.headers, body })
      )
      .then(({ status, body }) => {
        res.writeHead(status, { "Content-Type": "application/json" });
        res.end(JSON.stringify(body, null, 2));
      })
      .catch((caught: unknown) => {
        log.error({ err: caught }, "failed to answer request");
        res.writeHead(500, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ error: "server_error" }));
      });
  });

  await new Promise<void>((resolve) => {
    server.listen(webhook.port, resolve);
  });
  scheduler.start();
  log.info({ port: webhook.port, path: webhook.path }, "webhook listening");

  return {
    server,
    scheduler,
    close: async () => {
      scheduler.stop();
      await new Promise<void>((resolve, reject) => {
        server.close((caught) => (caught ? reject(caught) : resolve()));
      });
      await runtime.controller.flushAll();
      try {
        await runtime.controller.drain();
      } catch (caught) {
        log.error({ err: caught }, `dispatch failed during shutdown: ${describeError(caught)}`);
      }
      runtime.close();
    }
  };
};
