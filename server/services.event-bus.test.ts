import test from "node:test";
import assert from "node:assert/strict";
import type { ProducerRecord, RecordMetadata } from "kafkajs";
import { ZodError } from "zod";

import { domainEventSchema } from "@shared/events";
import { EVENT_SOURCE, EventBus, createDomainEvent, createEventBus, type EventProducer } from "./services/event-bus";
import { silentLogger } from "./test-support";

const baseEvent = createDomainEvent({
  category: "delivery.lifecycle",
  name: "created",
  payload: {
    deliveryId: "DEL-2403051200-AB12",
    orderId: "order-1",
    agentId: "agent-1",
    status: "assigned",
    deliveryFee: 40,
    agentPayout: 32,
  },
  actor: { actorType: "system" },
});

function fakeProducer(failures: number) {
  const sent: ProducerRecord[] = [];
  let attempts = 0;
  const producer: EventProducer = {
    async connect() {},
    async disconnect() {},
    async send(record: ProducerRecord): Promise<RecordMetadata[]> {
      attempts += 1;
      if (attempts <= failures) {
        throw new Error("temporary failure");
      }
      sent.push(record);
      return [];
    },
  };
  return { producer, sent, attempts: () => attempts };
}

test("createDomainEvent fills in the envelope", () => {
  assert.equal(baseEvent.source, EVENT_SOURCE);
  assert.equal(baseEvent.schemaVersion, "1.0");
  assert.match(baseEvent.eventId, /^[0-9a-f-]{36}$/);
  assert.ok(!Number.isNaN(Date.parse(baseEvent.occurredAt)));
});

test("memory event bus notifies listeners", async () => {
  const received: string[] = [];
  const bus = new EventBus({ driver: "memory", logger: silentLogger });
  const off = bus.on((event) => {
    received.push(event.eventId);
  });

  await bus.publish(baseEvent);
  off();
  await bus.publish(baseEvent);

  assert.deepEqual(received, [baseEvent.eventId]);
});

test("a failing listener does not fail the publish", async () => {
  const bus = new EventBus({ driver: "memory", logger: silentLogger });
  const received: string[] = [];
  bus.on(() => {
    throw new Error("listener broke");
  });
  bus.on((event) => {
    received.push(event.name);
  });

  await bus.publish(baseEvent);
  assert.deepEqual(received, ["created"]);
});

test("kafka event bus retries publish failures", async () => {
  const fake = fakeProducer(1);
  const bus = new EventBus({
    driver: "kafka",
    kafka: { brokers: ["localhost:9092"], topic: "delivery.events", producer: fake.producer },
    logger: silentLogger,
    maxRetries: 3,
    retryBackoffMs: 1,
  });

  await bus.publish(baseEvent);

  assert.equal(fake.attempts(), 2);
  assert.equal(fake.sent.length, 1);
  const [message] = fake.sent[0]?.messages ?? [];
  assert.equal(fake.sent[0]?.topic, "delivery.events");
  assert.equal(message?.key, "agent-1");
  assert.deepEqual(message?.headers, { category: "delivery.lifecycle", name: "created" });
  assert.equal(typeof message?.value, "string");
  assert.equal(JSON.parse(String(message?.value)).payload.deliveryId, "DEL-2403051200-AB12");
});

test("kafka event bus gives up after the last retry", async () => {
  const fake = fakeProducer(5);
  const bus = new EventBus({
    driver: "kafka",
    kafka: { brokers: ["localhost:9092"], topic: "delivery.events", producer: fake.producer },
    logger: silentLogger,
    maxRetries: 2,
    retryBackoffMs: 1,
  });

  await assert.rejects(bus.publish(baseEvent), /temporary failure/);
  assert.equal(fake.attempts(), 2);
});

test("payloads reject keys outside the schema", () => {
  const leaked = { ...baseEvent, payload: { ...baseEvent.payload, otp: "123456" } };
  assert.throws(() => domainEventSchema.parse(leaked), ZodError);
  assert.deepEqual(domainEventSchema.parse(baseEvent), baseEvent);
});

test("createEventBus needs brokers for kafka", () => {
  const config = {
    driver: "kafka" as const,
    kafkaBrokers: [],
    kafkaTopic: "delivery.events",
    clientId: "dispatch-test",
    maxRetries: 3,
    retryDelayMs: 100,
  };
  assert.throws(() => createEventBus(config, silentLogger), /KAFKA_BROKERS/);
  assert.ok(createEventBus({ ...config, driver: "memory" }, silentLogger) instanceof EventBus);
});
