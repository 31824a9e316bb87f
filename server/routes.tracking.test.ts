import test from "node:test";
import assert from "node:assert/strict";
import request from "supertest";

import { createTestApp, onlineAgent } from "./test-support";

test("GET /api/track/:deliveryCode is public and hides OTPs", async () => {
  const { app, ctx } = await createTestApp();
  const { agent } = await onlineAgent(ctx, "1");
  const delivery = await ctx.deliveries.createDelivery({ orderId: "order-1", agentId: agent.id });

  const res = await request(app).get(`/api/track/${delivery.deliveryCode}`);
  assert.equal(res.status, 200);
  assert.equal(res.body.deliveryCode, delivery.deliveryCode);
  assert.equal(res.body.status, "assigned");
  assert.equal(res.body.canRate, false);
  assert.equal(res.body.storePickupOtp, undefined);
  assert.deepEqual(
    res.body.steps.map((step: { key: string }) => step.key),
    ["assigned", "accepted", "at_store", "picked_up", "in_transit", "delivered"],
  );

  const missing = await request(app).get("/api/track/DEL-0000000000-NONE");
  assert.equal(missing.status, 404);
});

test("customers rate a delivered delivery once", async () => {
  const { app, ctx } = await createTestApp();
  const { agent } = await onlineAgent(ctx, "1");
  const delivery = await ctx.deliveries.createDelivery({ orderId: "order-1", agentId: agent.id });
  const url = `/api/track/${delivery.deliveryCode}/rating`;

  const early = await request(app).post(url).send({ rating: 5 });
  assert.equal(early.status, 400);
  assert.equal(early.body.message, "Only delivered deliveries can be rated.");

  const scope = { agentId: agent.id, actorType: "agent" as const };
  await ctx.deliveries.accept(delivery.deliveryCode, scope);
  await ctx.deliveries.arriveAtStore(delivery.deliveryCode, scope);
  await ctx.deliveries.pickup(delivery.deliveryCode, delivery.storePickupOtp, scope);
  await ctx.deliveries.complete(delivery.deliveryCode, delivery.customerDeliveryOtp, scope);

  const outOfRange = await request(app).post(url).send({ rating: 6 });
  assert.equal(outOfRange.status, 400);

  const rated = await request(app).post(url).send({ rating: 4, feedback: "Quick and friendly" });
  assert.equal(rated.status, 201);
  assert.equal(rated.body.message, "Thank you for your feedback!");
  assert.equal(rated.body.rating.rating, 4);

  const again = await request(app).post(url).send({ rating: 1 });
  assert.equal(again.status, 400);
  assert.equal(again.body.message, "This delivery has already been rated.");

  const tracking = await request(app).get(`/api/track/${delivery.deliveryCode}`);
  assert.deepEqual(tracking.body.rating, { rating: 4, feedback: "Quick and friendly" });
  assert.equal(tracking.body.canRate, false);
  assert.equal((await ctx.storage.getDeliveryAgent(agent.id))?.averageRating, "4.00");
});

test("GET /api/health answers without a database", async () => {
  const { app } = await createTestApp();
  const res = await request(app).get("/api/health");
  assert.equal(res.status, 200);
  assert.equal(res.body.status, "ok");
});
