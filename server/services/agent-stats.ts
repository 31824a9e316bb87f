import type { Logger } from "pino";

import type { Delivery, DeliveryAgent, DeliveryStatus } from "@shared/schema";
import type { AgentHistory, AgentPatch, IStorage } from "../storage";
import { roundMoney } from "./fee-calculator";
import { ACTIVE_DELIVERY_STATUSES } from "./delivery-state";
import { AgentNotFoundError } from "./errors";

export type AgentStats = Required<
  Pick<AgentPatch, "totalDeliveries" | "successfulDeliveries" | "failedDeliveries" | "totalEarnings">
>;

/**
 * Aggregates recomputed from the agent's whole delivery history. Every
 * delivery counts towards the total, including ones still in progress.
 * Cancelled deliveries count as failed.
 */
export function summarizeDeliveries(history: Pick<AgentHistory, "deliveries">): AgentStats {
  let successful = 0;
  let failed = 0;
  let earnings = 0;
  for (const delivery of history.deliveries) {
    if (delivery.status === "delivered") {
      successful += 1;
      earnings += Number(delivery.agentPayout);
    } else if (delivery.status === "failed" || delivery.status === "cancelled") {
      failed += 1;
    }
  }
  return {
    totalDeliveries: history.deliveries.length,
    successfulDeliveries: successful,
    failedDeliveries: failed,
    totalEarnings: roundMoney(earnings).toFixed(2),
  };
}

// Mean of all ratings, 2 decimals; "0.00" when unrated
export function averageRating(ratings: readonly number[]): string {
  if (!ratings.length) return "0.00";
  const sum = ratings.reduce((acc, value) => acc + value, 0);
  return roundMoney(sum / ratings.length).toFixed(2);
}

// Inclusive YYYY-MM-DD bounds, compared against UTC calendar days
export type EarningsRange = { from: string; to: string };

export type EarningsReport = EarningsRange & {
  totalEarnings: string;
  totalDeliveries: number;
  daily: Array<{ date: string; count: number; amount: string }>;
};

function utcDay(value: Date): string {
  return value.toISOString().slice(0, 10);
}

export function buildEarningsReport(
  deliveries: ReadonlyArray<Pick<Delivery, "status" | "deliveredAt" | "agentPayout">>,
  range: EarningsRange,
): EarningsReport {
  const byDay = new Map<string, { count: number; amount: number }>();
  let total = 0;
  let count = 0;
  for (const delivery of deliveries) {
    if (delivery.status !== "delivered" || !delivery.deliveredAt) continue;
    const day = utcDay(delivery.deliveredAt);
    if (day < range.from || day > range.to) continue;
    const payout = Number(delivery.agentPayout);
    const entry = byDay.get(day) ?? { count: 0, amount: 0 };
    entry.count += 1;
    entry.amount += payout;
    byDay.set(day, entry);
    total += payout;
    count += 1;
  }
  return {
    ...range,
    totalEarnings: roundMoney(total).toFixed(2),
    totalDeliveries: count,
    daily: Array.from(byDay.entries())
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, entry]) => ({ date, count: entry.count, amount: roundMoney(entry.amount).toFixed(2) })),
  };
}

export type AgentDashboard = {
  statusCounts: Record<Extract<DeliveryStatus, "assigned" | "accepted" | "at_store" | "picked_up" | "in_transit">, number> & {
    allActive: number;
  };
  today: { deliveries: number; completed: number; earnings: string };
  allTime: {
    totalDeliveries: number;
    completed: number;
    earnings: string;
    completionRate: number;
    averageRating: number;
  };
};

export function buildDashboard(
  agent: DeliveryAgent,
  deliveries: ReadonlyArray<Pick<Delivery, "status" | "createdAt" | "agentPayout">>,
  now: Date,
): AgentDashboard {
  const countStatus = (status: DeliveryStatus) => deliveries.filter((delivery) => delivery.status === status).length;
  const sumPayouts = (rows: ReadonlyArray<Pick<Delivery, "agentPayout">>) =>
    roundMoney(rows.reduce((acc, row) => acc + Number(row.agentPayout), 0)).toFixed(2);

  const today = utcDay(now);
  const createdToday = deliveries.filter((delivery) => utcDay(delivery.createdAt) === today);
  const completedToday = createdToday.filter((delivery) => delivery.status === "delivered");
  const delivered = deliveries.filter((delivery) => delivery.status === "delivered");

  return {
    statusCounts: {
      assigned: countStatus("assigned"),
      accepted: countStatus("accepted"),
      at_store: countStatus("at_store"),
      picked_up: countStatus("picked_up"),
      in_transit: countStatus("in_transit"),
      allActive: deliveries.filter((delivery) => ACTIVE_DELIVERY_STATUSES.includes(delivery.status)).length,
    },
    today: {
      deliveries: createdToday.length,
      completed: completedToday.length,
      earnings: sumPayouts(completedToday),
    },
    allTime: {
      totalDeliveries: agent.totalDeliveries,
      completed: agent.successfulDeliveries,
      earnings: sumPayouts(delivered),
      completionRate:
        agent.totalDeliveries > 0 ? roundMoney((agent.successfulDeliveries / agent.totalDeliveries) * 100) : 0,
      averageRating: Number(agent.averageRating),
    },
  };
}

interface AgentStatsDeps {
  storage: IStorage;
  logger: Logger;
}

export class AgentStatsService {
  private readonly storage: IStorage;
  private readonly logger: Logger;

  constructor({ storage, logger }: AgentStatsDeps) {
    this.storage = storage;
    this.logger = logger;
  }

  async recomputeAgentStats(agentId: string): Promise<DeliveryAgent> {
    const agent = await this.storage.updateAgentFromHistory(agentId, (history) => summarizeDeliveries(history));
    if (!agent) {
      throw new AgentNotFoundError(agentId);
    }
    this.logger.debug(
      {
        agentId,
        totalDeliveries: agent.totalDeliveries,
        successfulDeliveries: agent.successfulDeliveries,
        failedDeliveries: agent.failedDeliveries,
      },
      "agent stats recomputed",
    );
    return agent;
  }

  async recomputeAgentRating(agentId: string): Promise<DeliveryAgent> {
    const agent = await this.storage.updateAgentFromHistory(agentId, (history) => ({
      averageRating: averageRating(history.ratings),
    }));
    if (!agent) {
      throw new AgentNotFoundError(agentId);
    }
    this.logger.debug({ agentId, averageRating: agent.averageRating }, "agent rating recomputed");
    return agent;
  }

  async recomputeAll(agentId: string): Promise<DeliveryAgent> {
    const agent = await this.storage.updateAgentFromHistory(agentId, (history) => ({
      ...summarizeDeliveries(history),
      averageRating: averageRating(history.ratings),
    }));
    if (!agent) {
      throw new AgentNotFoundError(agentId);
    }
    return agent;
  }
}
