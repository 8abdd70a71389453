import fs from "node:fs";
import type { AdmissionDecision, RecoveryReport } from "./admission.js";
import type { DispatchReport } from "./dispatcher.js";
import { UnsupportedEventError } from "./errors.js";
import { normalizeGithubEvent } from "./ingest.js";
import type { InboundEvent } from "./db/types.js";
import type { Runtime } from "./runtime.js";

export type ActionInput = {
  eventPath: string;
  eventName: string;
  deliveryId?: string | null;
};

export type ActionResult = {
  event: InboundEvent;
  decision: AdmissionDecision;
  recovery: RecoveryReport;
  reports: DispatchReport[];
};

const loadEventFile = (eventPath: string): unknown => {
  const content = fs.readFileSync(eventPath, "utf8");
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new UnsupportedEventError(`Invalid JSON in event file: ${eventPath}`, { cause: error });
  }
};

/**
 * One-shot mode: admit the event from the runner's event file, dispatch
 * whatever is admitted (earlier deferrals included) and wait for the outcomes.
 */
export const runAction = async (runtime: Runtime, input: ActionInput): Promise<ActionResult> => {
  const log = runtime.logger.child({ module: "action" });
  const payload = loadEventFile(input.eventPath);
  log.info({ event_path: input.eventPath, event_name: input.eventName }, "loaded event");

  const event = normalizeGithubEvent({
    eventName: input.eventName,
    payload,
    deliveryId: input.deliveryId,
    receivedAt: Date.now()
  });

  const recovery = await runtime.controller.recover();
  const decision = await runtime.controller.onEvent(event);
  log.info({ event_id: event.id, decision }, "admission decided");

  await runtime.controller.flushAll();
  const reports = await runtime.controller.drain();
  return { event, decision, recovery, reports };
};
