import { randomUUID } from "node:crypto";
import test from "node:test";
import assert from "node:assert/strict";
import request from "supertest";

import { agentInput, createTestApp, onlineAgent } from "./test-support";

test("agent routes need a known agent", async () => {
  const { app } = await createTestApp();

  const missing = await request(app).get("/api/agent/me");
  assert.equal(missing.status, 401);

  const malformed = await request(app).get("/api/agent/me").set("x-agent-id", "nobody");
  assert.equal(malformed.status, 403);
  assert.equal(malformed.body.message, "Delivery agent profile not found");

  const unknown = await request(app).get("/api/agent/me").set("x-agent-id", randomUUID());
  assert.equal(unknown.status, 403);
  assert.equal(unknown.body.message, "Delivery agent profile not found");
});

test("GET /api/agent/me returns the profile with its coverage", async () => {
  const { app, ctx } = await createTestApp();
  const { agent, area } = await onlineAgent(ctx, "1");

  const res = await request(app).get("/api/agent/me").set("x-agent-id", agent.id);
  assert.equal(res.status, 200);
  assert.equal(res.body.agentCode, agent.agentCode);
  assert.equal(res.body.currentOrdersCount, 0);
  assert.equal(res.body.canAcceptOrders, true);
  assert.deepEqual(res.body.activeZipAreaIds, [area.id]);
});

test("an agent walks a delivery through pickup and drop-off", async () => {
  const { app, ctx } = await createTestApp();
  const { agent } = await onlineAgent(ctx, "1");
  const delivery = await ctx.deliveries.createDelivery({ orderId: "order-1", agentId: agent.id });
  const base = `/api/agent/deliveries/${delivery.deliveryCode}`;

  const early = await request(app).post(`${base}/pickup`).set("x-agent-id", agent.id).send({ otp: delivery.storePickupOtp });
  assert.equal(early.status, 409);
  assert.equal(early.body.reason, "invalid_state");

  const accepted = await request(app).post(`${base}/accept`).set("x-agent-id", agent.id);
  assert.equal(accepted.status, 200);
  assert.equal(accepted.body.success, true);
  assert.equal(accepted.body.delivery.status, "accepted");
  assert.equal(accepted.body.delivery.storePickupOtp, undefined);
  assert.equal(accepted.body.delivery.customerDeliveryOtp, undefined);

  await request(app).post(`${base}/arrive`).set("x-agent-id", agent.id).expect(200);

  const malformed = await request(app).post(`${base}/pickup`).set("x-agent-id", agent.id).send({ otp: "12ab" });
  assert.equal(malformed.status, 400);
  assert.equal(malformed.body.message, "Invalid request");

  const wrong = delivery.storePickupOtp === "000000" ? "111111" : "000000";
  const mismatch = await request(app).post(`${base}/pickup`).set("x-agent-id", agent.id).send({ otp: wrong });
  assert.equal(mismatch.status, 400);
  assert.deepEqual(mismatch.body, {
    success: false,
    reason: "otp_mismatch",
    message: "Invalid OTP. Please check the code and try again.",
  });

  await request(app).post(`${base}/pickup`).set("x-agent-id", agent.id).send({ otp: delivery.storePickupOtp }).expect(200);
  await request(app).post(`${base}/in-transit`).set("x-agent-id", agent.id).expect(200);
  const done = await request(app)
    .post(`${base}/complete`)
    .set("x-agent-id", agent.id)
    .send({ otp: delivery.customerDeliveryOtp });
  assert.equal(done.status, 200);
  assert.equal(done.body.delivery.status, "delivered");
  assert.equal(done.body.delivery.customerDeliveryVerified, true);

  const detail = await request(app).get(base).set("x-agent-id", agent.id);
  assert.equal(detail.status, 200);
  assert.equal(detail.body.delivery.status, "delivered");
  assert.equal(detail.body.trackingPoints.length, 1);
});

test("another agent's delivery is not found", async () => {
  const { app, ctx } = await createTestApp();
  const { agent } = await onlineAgent(ctx, "1");
  const { agent: other } = await onlineAgent(ctx, "2");
  const delivery = await ctx.deliveries.createDelivery({ orderId: "order-1", agentId: agent.id });

  const res = await request(app)
    .post(`/api/agent/deliveries/${delivery.deliveryCode}/accept`)
    .set("x-agent-id", other.id);
  assert.equal(res.status, 404);
  assert.equal(res.body.message, "Delivery not found");

  const detail = await request(app).get(`/api/agent/deliveries/${delivery.deliveryCode}`).set("x-agent-id", other.id);
  assert.equal(detail.status, 404);
});

test("cancel needs no reason and fail needs one", async () => {
  const { app, ctx } = await createTestApp();
  const { agent } = await onlineAgent(ctx, "1");
  const first = await ctx.deliveries.createDelivery({ orderId: "order-1", agentId: agent.id });
  const second = await ctx.deliveries.createDelivery({ orderId: "order-2", agentId: agent.id });

  const cancelled = await request(app)
    .post(`/api/agent/deliveries/${first.deliveryCode}/cancel`)
    .set("x-agent-id", agent.id);
  assert.equal(cancelled.status, 200);
  assert.equal(cancelled.body.delivery.status, "cancelled");
  assert.deepEqual(await ctx.storage.getDeliveryIssues(first.id), []);

  const noReason = await request(app)
    .post(`/api/agent/deliveries/${second.deliveryCode}/fail`)
    .set("x-agent-id", agent.id)
    .send({});
  assert.equal(noReason.status, 400);

  const failed = await request(app)
    .post(`/api/agent/deliveries/${second.deliveryCode}/fail`)
    .set("x-agent-id", agent.id)
    .send({ reason: "address not found" });
  assert.equal(failed.status, 200);
  assert.equal(failed.body.delivery.status, "failed");
});

test("GET /api/agent/deliveries filters by status", async () => {
  const { app, ctx } = await createTestApp();
  const { agent } = await onlineAgent(ctx, "1");
  const first = await ctx.deliveries.createDelivery({ orderId: "order-1", agentId: agent.id });
  await ctx.deliveries.createDelivery({ orderId: "order-2", agentId: agent.id });
  await ctx.deliveries.accept(first.deliveryCode, { agentId: agent.id, actorType: "agent" });

  const res = await request(app).get("/api/agent/deliveries?status=in_progress").set("x-agent-id", agent.id);
  assert.equal(res.status, 200);
  assert.equal(res.body.status, "in_progress");
  assert.deepEqual(
    res.body.deliveries.map((delivery: { orderId: string }) => delivery.orderId),
    ["order-1"],
  );
  assert.equal(res.body.counts.all, 2);
  assert.equal(res.body.counts.pending, 1);

  const invalid = await request(app).get("/api/agent/deliveries?status=lost").set("x-agent-id", agent.id);
  assert.equal(invalid.status, 400);
});

test("availability toggle reports missing coverage", async () => {
  const { app, ctx } = await createTestApp();
  const agent = await ctx.agents.registerAgent(agentInput("1"));

  const res = await request(app).post("/api/agent/availability/toggle").set("x-agent-id", agent.id);
  assert.equal(res.status, 400);
  assert.equal(res.body.message, "ZIP code required. Please set your service areas first.");

  const area = await ctx.storage.createZipArea({ zipCode: "10001" });
  const coverage = await request(app)
    .put("/api/agent/zip-coverage")
    .set("x-agent-id", agent.id)
    .send({ zipAreaIds: [area.id] });
  assert.equal(coverage.status, 200);
  assert.equal(coverage.body.length, 1);

  const toggled = await request(app).post("/api/agent/availability/toggle").set("x-agent-id", agent.id);
  assert.equal(toggled.status, 200);
  assert.deepEqual(toggled.body, { success: true, isAvailable: true, status: "active" });
});

test("PUT /api/agent/zip-coverage rejects unknown areas", async () => {
  const { app, ctx } = await createTestApp();
  const agent = await ctx.agents.registerAgent(agentInput("1"));
  const unknownId = randomUUID();

  const res = await request(app)
    .put("/api/agent/zip-coverage")
    .set("x-agent-id", agent.id)
    .send({ zipAreaIds: [unknownId] });
  assert.equal(res.status, 400);
  assert.equal(res.body.message, `Unknown or inactive ZIP areas: ${unknownId}`);

  const malformed = await request(app)
    .put("/api/agent/zip-coverage")
    .set("x-agent-id", agent.id)
    .send({ zipAreaIds: ["missing"] });
  assert.equal(malformed.status, 400);
  assert.equal(malformed.body.message, "Invalid request");
});

test("PUT /api/agent/status validates the status", async () => {
  const { app, ctx } = await createTestApp();
  const { agent } = await onlineAgent(ctx, "1");

  const ok = await request(app).put("/api/agent/status").set("x-agent-id", agent.id).send({ status: "on_break" });
  assert.deepEqual(ok.body, { success: true, status: "on_break" });

  const bad = await request(app).put("/api/agent/status").set("x-agent-id", agent.id).send({ status: "asleep" });
  assert.equal(bad.status, 400);
});

test("POST /api/agent/location tracks only the agent's own deliveries", async () => {
  const { app, ctx } = await createTestApp();
  const { agent } = await onlineAgent(ctx, "1");
  const delivery = await ctx.deliveries.createDelivery({ orderId: "order-1", agentId: agent.id });

  const tracked = await request(app)
    .post("/api/agent/location")
    .set("x-agent-id", agent.id)
    .send({ latitude: "40.5", longitude: "-73.9", deliveryCode: delivery.deliveryCode });
  assert.deepEqual(tracked.body, { success: true, tracked: true });

  const plain = await request(app)
    .post("/api/agent/location")
    .set("x-agent-id", agent.id)
    .send({ latitude: 40.6, longitude: -73.8 });
  assert.deepEqual(plain.body, { success: true, tracked: false });

  const outOfRange = await request(app)
    .post("/api/agent/location")
    .set("x-agent-id", agent.id)
    .send({ latitude: 91, longitude: 0 });
  assert.equal(outOfRange.status, 400);

  const refreshed = await ctx.storage.getDeliveryAgent(agent.id);
  assert.equal(refreshed?.currentLatitude, "40.6");
});

test("issues are recorded against the delivery", async () => {
  const { app, ctx } = await createTestApp();
  const { agent } = await onlineAgent(ctx, "1");
  const delivery = await ctx.deliveries.createDelivery({ orderId: "order-1", agentId: agent.id });

  const res = await request(app)
    .post(`/api/agent/deliveries/${delivery.deliveryCode}/issues`)
    .set("x-agent-id", agent.id)
    .send({ issueType: "location", description: "Gate code missing" });
  assert.equal(res.status, 201);
  assert.equal(res.body.issueType, "location");
  assert.equal(res.body.resolved, false);
});

test("earnings and dashboard answer for a new agent", async () => {
  const { app, ctx } = await createTestApp();
  const { agent } = await onlineAgent(ctx, "1");

  const earnings = await request(app)
    .get("/api/agent/earnings?from=2024-03-01&to=2024-03-31")
    .set("x-agent-id", agent.id);
  assert.deepEqual(earnings.body, {
    from: "2024-03-01",
    to: "2024-03-31",
    totalEarnings: "0.00",
    totalDeliveries: 0,
    daily: [],
  });

  const badRange = await request(app).get("/api/agent/earnings?from=March").set("x-agent-id", agent.id);
  assert.equal(badRange.status, 400);

  const dashboard = await request(app).get("/api/agent/dashboard").set("x-agent-id", agent.id);
  assert.equal(dashboard.status, 200);
  assert.equal(dashboard.body.statusCounts.allActive, 0);
  assert.deepEqual(dashboard.body.activeDeliveries, []);
});
