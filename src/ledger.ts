import type { DatabaseClient } from "./db/client.js";
import {
  appendCostEntry,
  eventStatsSince,
  sumCostsByTypeSince,
  sumCostsSince,
  sumCostsTotal,
  type EventTypeStats
} from "./db/costs.js";
import type { CostEntryRecord, EventType } from "./db/types.js";

export type Clock = () => number;

export const HOUR_MS = 60 * 60 * 1000;

export type CostRecordInput = {
  eventType: EventType;
  amount: number;
  tokens?: number;
  eventId?: string | null;
  timestamp?: number;
};

export type CostLedger = {
  record: (input: CostRecordInput) => CostEntryRecord;
  hourlyRate: () => number;
  averageHourlyRate: (hours: number) => number;
  totalSpend: () => number;
  spendByType: (since?: number) => Record<EventType, number>;
  eventStats: (hours: number, type?: EventType) => EventTypeStats[];
  efficiency: (targetHourlyRate: number) => number;
  isCostEfficient: (targetHourlyRate: number) => boolean;
};

export type CostLedgerOptions = {
  db: DatabaseClient;
  now?: Clock;
};

/**
 * Read-side views over the append-only cost entries. Every rate is a fresh sum
 * over the trailing window; nothing keeps a running total.
 */
export const createCostLedger = ({ db, now = Date.now }: CostLedgerOptions): CostLedger => {
  const averageHourlyRate = (hours: number): number => {
    if (hours <= 0) {
      throw new RangeError(`hours must be positive, got ${hours}`);
    }
    return sumCostsSince(db, now() - hours * HOUR_MS) / hours;
  };

  const hourlyRate = (): number => sumCostsSince(db, now() - HOUR_MS);

  return {
    record: (input) => {
      if (!Number.isFinite(input.amount) || input.amount < 0) {
        throw new RangeError(`cost amount must be a non-negative number, got ${input.amount}`);
      }
      return appendCostEntry(db, {
        eventId: input.eventId ?? null,
        eventType: input.eventType,
        amount: input.amount,
        tokens: input.tokens,
        timestamp: input.timestamp ?? now()
      });
    },
    hourlyRate,
    averageHourlyRate,
    totalSpend: () => sumCostsTotal(db),
    spendByType: (since = 0) => {
      const totals: Record<EventType, number> = { discussion: 0, issue: 0, pull_request: 0 };
      for (const row of sumCostsByTypeSince(db, since)) {
        totals[row.event_type] = row.total;
      }
      return totals;
    },
    eventStats: (hours, type) => eventStatsSince(db, now() - hours * HOUR_MS, type),
    efficiency: (targetHourlyRate) => {
      const rate = hourlyRate();
      return rate > 0 ? targetHourlyRate / rate : 1;
    },
    isCostEfficient: (targetHourlyRate) => hourlyRate() <= targetHourlyRate
  };
};
