import test from "node:test";
import assert from "node:assert/strict";

import type { Delivery, DeliveryAgent } from "@shared/schema";
import { averageRating, buildDashboard, buildEarningsReport, summarizeDeliveries } from "./services/agent-stats";
import { AgentNotFoundError } from "./services/errors";
import { createTestContext, onlineAgent } from "./test-support";

type HistoryRow = Pick<Delivery, "status" | "agentPayout" | "createdAt" | "deliveredAt">;

function row(status: Delivery["status"], agentPayout: string, createdAt: string, deliveredAt: string | null = null): HistoryRow {
  return { status, agentPayout, createdAt: new Date(createdAt), deliveredAt: deliveredAt ? new Date(deliveredAt) : null };
}

function agentRow(overrides: Partial<DeliveryAgent>): DeliveryAgent {
  const createdAt = new Date("2024-01-01T00:00:00Z");
  return {
    id: "agent-1",
    agentCode: "AGT0001",
    userId: "user-1",
    storeId: "store-1",
    phoneNumber: "5550100",
    alternativePhone: null,
    status: "active",
    isAvailable: true,
    maxConcurrentOrders: 3,
    serviceAreaRadius: 10,
    vehicleType: "scooter",
    vehicleNumber: null,
    currentLatitude: null,
    currentLongitude: null,
    lastLocationUpdate: null,
    totalDeliveries: 0,
    successfulDeliveries: 0,
    failedDeliveries: 0,
    totalEarnings: "0.00",
    averageRating: "0.00",
    createdAt,
    updatedAt: createdAt,
    ...overrides,
  };
}

test("summarizeDeliveries counts every delivery and folds cancellations into failures", () => {
  const stats = summarizeDeliveries({
    deliveries: [
      row("delivered", "32.00", "2024-03-01T10:00:00Z", "2024-03-01T11:00:00Z"),
      row("delivered", "36.80", "2024-03-02T10:00:00Z", "2024-03-02T11:00:00Z"),
      row("cancelled", "32.00", "2024-03-03T10:00:00Z"),
      row("failed", "32.00", "2024-03-03T12:00:00Z"),
      row("in_transit", "32.00", "2024-03-04T10:00:00Z"),
    ],
  });
  assert.deepEqual(stats, {
    totalDeliveries: 5,
    successfulDeliveries: 2,
    failedDeliveries: 2,
    totalEarnings: "68.80",
  });
});

test("averageRating rounds to two decimals", () => {
  assert.equal(averageRating([]), "0.00");
  assert.equal(averageRating([4, 5, 3]), "4.00");
  assert.equal(averageRating([1, 2, 2]), "1.67");
  assert.equal(averageRating([5, 4]), "4.50");
});

test("buildEarningsReport keeps delivered rows inside the range", () => {
  const report = buildEarningsReport(
    [
      row("delivered", "32.00", "2024-02-28T10:00:00Z", "2024-02-29T23:59:00Z"),
      row("delivered", "32.00", "2024-03-01T10:00:00Z", "2024-03-01T00:00:00Z"),
      row("delivered", "40.50", "2024-03-01T10:00:00Z", "2024-03-01T18:00:00Z"),
      row("cancelled", "32.00", "2024-03-01T10:00:00Z"),
      row("delivered", "10.00", "2024-03-01T10:00:00Z", "2024-04-01T00:00:00Z"),
    ],
    { from: "2024-03-01", to: "2024-03-31" },
  );
  assert.deepEqual(report, {
    from: "2024-03-01",
    to: "2024-03-31",
    totalEarnings: "72.50",
    totalDeliveries: 2,
    daily: [{ date: "2024-03-01", count: 2, amount: "72.50" }],
  });
});

test("buildDashboard splits today's work from all-time figures", () => {
  const dashboard = buildDashboard(
    agentRow({ totalDeliveries: 4, successfulDeliveries: 3, averageRating: "4.50" }),
    [
      row("assigned", "32.00", "2024-03-05T09:00:00Z"),
      row("delivered", "32.00", "2024-03-05T08:00:00Z", "2024-03-05T08:30:00Z"),
      row("delivered", "32.00", "2024-03-04T08:00:00Z", "2024-03-04T08:30:00Z"),
      row("delivered", "36.00", "2024-03-03T08:00:00Z", "2024-03-03T08:30:00Z"),
    ],
    new Date("2024-03-05T12:00:00Z"),
  );
  assert.deepEqual(dashboard.statusCounts, {
    assigned: 1,
    accepted: 0,
    at_store: 0,
    picked_up: 0,
    in_transit: 0,
    allActive: 1,
  });
  assert.deepEqual(dashboard.today, { deliveries: 2, completed: 1, earnings: "32.00" });
  assert.deepEqual(dashboard.allTime, {
    totalDeliveries: 4,
    completed: 3,
    earnings: "100.00",
    completionRate: 75,
    averageRating: 4.5,
  });
});

test("recompute repairs drifted counters from history", async () => {
  const ctx = await createTestContext();
  const { agent } = await onlineAgent(ctx, "1");
  const delivery = await ctx.deliveries.createDelivery({ orderId: "order-1", agentId: agent.id });
  await ctx.deliveries.cancel(delivery.deliveryCode, { actorType: "admin" });

  await ctx.storage.updateAgentLocked(agent.id, () => ({
    totalDeliveries: 9,
    successfulDeliveries: 9,
    failedDeliveries: 0,
    totalEarnings: "999.00",
  }));

  const repaired = await ctx.stats.recomputeAll(agent.id);
  assert.equal(repaired.totalDeliveries, 1);
  assert.equal(repaired.successfulDeliveries, 0);
  assert.equal(repaired.failedDeliveries, 1);
  assert.equal(repaired.totalEarnings, "0.00");
  assert.equal(repaired.averageRating, "0.00");
});

test("recompute rejects unknown agents", async () => {
  const ctx = await createTestContext();
  await assert.rejects(ctx.stats.recomputeAgentStats("missing"), AgentNotFoundError);
});
