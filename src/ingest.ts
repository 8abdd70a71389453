import { z } from "zod";
import type { EventType, InboundEvent } from "./db/types.js";
import { UnsupportedEventError } from "./errors.js";

export const SUMMARY_LIMIT = 16_000;

const CHARS_PER_TOKEN = 4;

/** Rough token count of a text, four characters to a token. */
export const approximateTokens = (text: string): number =>
  Math.ceil(text.length / CHARS_PER_TOKEN);

const EVENT_NAMES = new Map<string, EventType>([
  ["issues", "issue"],
  ["pull_request", "pull_request"],
  ["discussion", "discussion"]
]);

const subjectSchema = z.object({
  number: z.number().int(),
  title: z.string().default(""),
  body: z.string().nullable().optional(),
  updated_at: z.string().optional()
});

const payloadSchema = z.object({
  action: z.string().min(1),
  repository: z.object({ full_name: z.string().min(1) }).optional(),
  issue: subjectSchema.optional(),
  pull_request: subjectSchema.optional(),
  discussion: subjectSchema.optional()
});

type Subject = z.infer<typeof subjectSchema>;

export type NormalizeInput = {
  eventName: string;
  payload: unknown;
  deliveryId?: string | null;
  receivedAt: number;
};

const pickSubject = (
  type: EventType,
  payload: z.infer<typeof payloadSchema>
): Subject | undefined => {
  switch (type) {
    case "issue":
      return payload.issue;
    case "pull_request":
      return payload.pull_request;
    case "discussion":
      return payload.discussion;
  }
};

export const toEventType = (eventName: string): EventType => {
  const type = EVENT_NAMES.get(eventName);
  if (!type) {
    throw new UnsupportedEventError(`Unsupported event type: ${eventName || "(missing)"}`);
  }
  return type;
};

const subjectText = (subject: Subject): string => {
  const body = subject.body?.trim() ?? "";
  return body ? `${subject.title}\n\n${body}` : subject.title;
};

const truncate = (text: string): string =>
  text.length > SUMMARY_LIMIT ? text.slice(0, SUMMARY_LIMIT) : text;

/**
 * Maps an issues, pull_request or discussion webhook payload onto the event
 * shape admission works with. Authenticity is checked before this point.
 * The token estimate covers the full text; only the stored summary is capped.
 */
export const normalizeGithubEvent = ({
  eventName,
  payload,
  deliveryId,
  receivedAt
}: NormalizeInput): InboundEvent => {
  const type = toEventType(eventName);

  const parsed = payloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new UnsupportedEventError(
      `Malformed ${eventName} payload: ${parsed.error.issues[0]?.message ?? "invalid"}`
    );
  }

  const subject = pickSubject(type, parsed.data);
  if (!subject) {
    throw new UnsupportedEventError(`${eventName} payload has no ${type} object`);
  }

  const repo = parsed.data.repository?.full_name ?? "unknown";
  const subjectId = `${repo}#${subject.number}`;
  const id =
    deliveryId?.trim() ||
    `${eventName}:${subjectId}:${parsed.data.action}:${subject.updated_at ?? ""}`;

  const text = subjectText(subject);
  return {
    id,
    type,
    action: parsed.data.action,
    subject_id: subjectId,
    payload_summary: truncate(text),
    received_at: receivedAt,
    token_estimate: approximateTokens(text)
  };
};
