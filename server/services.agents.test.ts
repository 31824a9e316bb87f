import test from "node:test";
import assert from "node:assert/strict";

import { AgentService, canAcceptOrders, planCoverageUpdate, successRate } from "./services/agents";
import {
  AgentAlreadyRegisteredError,
  AgentIdExhaustedError,
  AgentNotFoundError,
  InvalidZipAreaError,
  MissingCoverageError,
} from "./services/errors";
import type { AgentZipCoverage } from "@shared/schema";
import { agentInput, createTestContext, onlineAgent, silentLogger } from "./test-support";

function sequence(values: number[]) {
  let index = 0;
  return (_max: number) => values[index++ % values.length] ?? 0;
}

test("registration starts agents offline with a fresh agent code", async () => {
  const ctx = await createTestContext();
  const agent = await ctx.agents.registerAgent(agentInput("1"));
  assert.match(agent.agentCode, /^AGT\d{4}$/);
  assert.equal(agent.status, "offline");
  assert.equal(agent.isAvailable, false);
  assert.equal(agent.maxConcurrentOrders, 3);
  assert.equal(agent.vehicleType, "scooter");

  await assert.rejects(ctx.agents.registerAgent(agentInput("1")), AgentAlreadyRegisteredError);
});

test("agent code collisions are retried and eventually give up", async () => {
  const ctx = await createTestContext();
  const zeros = new AgentService({ storage: ctx.storage, logger: silentLogger, events: ctx.bus, random: () => 0 });
  const first = await zeros.registerAgent(agentInput("1"));
  assert.equal(first.agentCode, "AGT0000");

  const retrying = new AgentService({
    storage: ctx.storage,
    logger: silentLogger,
    events: ctx.bus,
    random: sequence([0, 0, 0, 0, 1, 1, 1, 1]),
  });
  const second = await retrying.registerAgent(agentInput("2"));
  assert.equal(second.agentCode, "AGT1111");

  await assert.rejects(zeros.registerAgent(agentInput("3")), AgentIdExhaustedError);
  assert.equal(await ctx.storage.getDeliveryAgentByUserId("user-3"), undefined);
});

test("availability needs an active ZIP coverage", async () => {
  const ctx = await createTestContext();
  const agent = await ctx.agents.registerAgent(agentInput("1"));

  await assert.rejects(ctx.agents.toggleAvailability(agent.id), MissingCoverageError);
  const untouched = await ctx.agents.getAgent(agent.id);
  assert.equal(untouched.isAvailable, false);
  assert.equal(untouched.status, "offline");
  await assert.rejects(ctx.agents.toggleAvailability("missing"), AgentNotFoundError);
});

test("toggling moves between offline and active", async () => {
  const ctx = await createTestContext();
  const { agent } = await onlineAgent(ctx, "1");
  assert.equal(agent.isAvailable, true);
  assert.equal(agent.status, "active");

  const off = await ctx.agents.toggleAvailability(agent.id);
  assert.equal(off.isAvailable, false);
  assert.equal(off.status, "offline");

  // Going unavailable also needs coverage
  await ctx.agents.toggleAvailability(agent.id);
  await ctx.agents.updateZipCoverage(agent.id, []);
  await assert.rejects(ctx.agents.toggleAvailability(agent.id), MissingCoverageError);
  assert.equal((await ctx.agents.getAgent(agent.id)).isAvailable, true);

  const availability = ctx.events.filter((event) => event.name === "availability_changed");
  assert.equal(availability.length, 3);
});

test("toggling keeps a break status", async () => {
  const ctx = await createTestContext();
  const { agent } = await onlineAgent(ctx, "1");
  await ctx.agents.setStatus(agent.id, "on_break");

  const off = await ctx.agents.toggleAvailability(agent.id);
  assert.equal(off.isAvailable, false);
  assert.equal(off.status, "on_break");
  const on = await ctx.agents.toggleAvailability(agent.id);
  assert.equal(on.isAvailable, true);
  assert.equal(on.status, "on_break");
});

test("coverage updates deactivate, reactivate and create rows", async () => {
  const ctx = await createTestContext();
  const agent = await ctx.agents.registerAgent(agentInput("1"));
  const [a, b, c] = await Promise.all(["10001", "10002", "10003"].map((zipCode) => ctx.storage.createZipArea({ zipCode })));
  assert.ok(a && b && c);

  await ctx.agents.updateZipCoverage(agent.id, [a.id, b.id]);
  await ctx.agents.updateZipCoverage(agent.id, [b.id, c.id, c.id]);
  const rows = await ctx.agents.updateZipCoverage(agent.id, [a.id]);

  assert.equal(rows.length, 3);
  const active = await ctx.agents.getActiveCoverages(agent.id);
  assert.deepEqual(
    active.map((coverage) => coverage.zipAreaId),
    [a.id],
  );
});

test("coverage rejects unknown and inactive areas without changes", async () => {
  const ctx = await createTestContext();
  const agent = await ctx.agents.registerAgent(agentInput("1"));
  const closed = await ctx.storage.createZipArea({ zipCode: "10009", isActive: false });

  await assert.rejects(ctx.agents.updateZipCoverage(agent.id, [closed.id, "missing"]), (error: unknown) => {
    assert.ok(error instanceof InvalidZipAreaError);
    assert.deepEqual(error.zipAreaIds, [closed.id, "missing"]);
    return true;
  });
  assert.deepEqual(await ctx.storage.getAgentZipCoverages(agent.id), []);
});

test("planCoverageUpdate diffs rows against the selection", () => {
  const at = new Date("2024-01-01T00:00:00Z");
  const coverage = (id: string, zipAreaId: string, isActive: boolean): AgentZipCoverage => ({
    id,
    agentId: "agent-1",
    zipAreaId,
    isActive,
    deliveryFeeOverride: null,
    createdAt: at,
    updatedAt: at,
  });
  const changes = planCoverageUpdate(
    [coverage("c1", "z1", true), coverage("c2", "z2", false), coverage("c3", "z3", true)],
    ["z2", "z3", "z4"],
  );
  assert.deepEqual(changes, { deactivate: ["c1"], reactivate: ["c2"], create: ["z4"] });
});

test("location updates move the agent and track the named delivery", async () => {
  const ctx = await createTestContext();
  const { agent } = await onlineAgent(ctx, "1");
  const { agent: other } = await onlineAgent(ctx, "2");
  const delivery = await ctx.deliveries.createDelivery({ orderId: "order-1", agentId: agent.id });
  const now = new Date("2024-03-05T10:00:00Z");

  const tracked = await ctx.agents.updateLocation(
    agent.id,
    { latitude: 12.5, longitude: -3.25, deliveryCode: delivery.deliveryCode },
    now,
  );
  assert.equal(tracked.agent.currentLatitude, "12.5");
  assert.equal(tracked.agent.currentLongitude, "-3.25");
  assert.deepEqual(tracked.agent.lastLocationUpdate, now);
  assert.equal(tracked.trackingPoint?.deliveryId, delivery.id);

  const foreign = await ctx.agents.updateLocation(other.id, {
    latitude: 1,
    longitude: 1,
    deliveryCode: delivery.deliveryCode,
  });
  assert.equal(foreign.trackingPoint, null);
  assert.equal((await ctx.storage.getTrackingPoints(delivery.id)).length, 2);

  const located = ctx.events.filter((event) => event.name === "location_updated");
  assert.equal(located.length, 2);
  assert.equal(located[0]?.payload.deliveryId, delivery.deliveryCode);
  assert.equal(located[1]?.payload.deliveryId, null);
});

test("profile reports load and whether the agent can take more orders", async () => {
  const ctx = await createTestContext();
  const { agent } = await onlineAgent(ctx, "1");
  for (const orderId of ["order-1", "order-2", "order-3"]) {
    await ctx.deliveries.createDelivery({ orderId, agentId: agent.id });
  }

  const profile = await ctx.agents.getProfile(agent.id);
  assert.equal(profile.currentOrdersCount, 3);
  assert.equal(profile.canAcceptOrders, false);
  assert.equal(profile.successRate, 0);
  await assert.rejects(ctx.agents.getProfile("missing"), AgentNotFoundError);
});

test("successRate and canAcceptOrders", () => {
  assert.equal(successRate({ totalDeliveries: 0, successfulDeliveries: 0 }), 0);
  assert.equal(successRate({ totalDeliveries: 3, successfulDeliveries: 2 }), 66.67);
  assert.equal(canAcceptOrders({ isAvailable: true, status: "active", maxConcurrentOrders: 3 }, 2), true);
  assert.equal(canAcceptOrders({ isAvailable: true, status: "busy", maxConcurrentOrders: 3 }, 0), false);
  assert.equal(canAcceptOrders({ isAvailable: false, status: "active", maxConcurrentOrders: 3 }, 0), false);
});
