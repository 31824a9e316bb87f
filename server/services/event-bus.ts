import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { Kafka, type Producer } from "kafkajs";
import { domainEventSchema, type DomainEvent } from "@shared/events";

export type EventBusDriver = "memory" | "kafka";

export const EVENT_SOURCE = "delivery-dispatch-api";

export type EventProducer = Pick<Producer, "connect" | "disconnect" | "send">;

type BusLogger = Pick<Logger, "info" | "warn" | "error">;

export interface EventBusOptions {
  driver: EventBusDriver;
  kafka?: {
    brokers: string[];
    topic: string;
    clientId?: string;
    producer?: EventProducer;
  };
  maxRetries?: number;
  retryBackoffMs?: number;
  logger?: BusLogger;
}

export interface EventPublisher {
  publish(event: DomainEvent): Promise<void>;
}

type EventListener = (event: DomainEvent) => void | Promise<void>;

const defaultLogger: BusLogger = {
  info: (...args: unknown[]) => console.info("[event-bus]", ...args),
  warn: (...args: unknown[]) => console.warn("[event-bus]", ...args),
  error: (...args: unknown[]) => console.error("[event-bus]", ...args),
};

export class EventBus implements EventPublisher {
  private readonly logger: BusLogger;
  private readonly listeners = new Set<EventListener>();
  private kafkaProducer?: EventProducer;

  constructor(private readonly options: EventBusOptions) {
    this.logger = options.logger ?? defaultLogger;
  }

  on(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  async publish(event: DomainEvent): Promise<void> {
    const payload = domainEventSchema.parse(event);

    if (this.options.driver === "kafka") {
      const kafkaConfig = this.options.kafka;
      if (!kafkaConfig) {
        throw new Error("Kafka configuration is required for Kafka driver");
      }
      const serialized = JSON.stringify(payload);
      await this.withRetry(async () => {
        const producer = await this.ensureKafkaProducer();
        await producer.send({
          topic: kafkaConfig.topic,
          messages: [
            {
              key: payload.payload.agentId,
              value: serialized,
              headers: { category: payload.category, name: payload.name },
            },
          ],
        });
      });
    }

    await this.notifyListeners(payload);
  }

  async shutdown(): Promise<void> {
    if (this.kafkaProducer && !this.options.kafka?.producer) {
      try {
        await this.kafkaProducer.disconnect();
      } catch (error) {
        this.logger.warn({ err: error }, "Failed to disconnect Kafka producer");
      }
    }
    this.listeners.clear();
  }

  private async ensureKafkaProducer(): Promise<EventProducer> {
    if (this.kafkaProducer) {
      return this.kafkaProducer;
    }
    const kafkaConfig = this.options.kafka;
    if (!kafkaConfig) {
      throw new Error("Kafka configuration is required for Kafka driver");
    }
    if (kafkaConfig.producer) {
      this.kafkaProducer = kafkaConfig.producer;
      return this.kafkaProducer;
    }
    const kafka = new Kafka({
      clientId: kafkaConfig.clientId ?? EVENT_SOURCE,
      brokers: kafkaConfig.brokers,
    });
    const producer = kafka.producer();
    await producer.connect();
    this.kafkaProducer = producer;
    return producer;
  }

  private async notifyListeners(event: DomainEvent): Promise<void> {
    const listeners = Array.from(this.listeners);
    if (!listeners.length) return;
    await Promise.all(
      listeners.map(async (listener) => {
        try {
          await listener(event);
        } catch (error) {
          this.logger.warn({ err: error, eventId: event.eventId }, "Event listener failed");
        }
      }),
    );
  }

  private async withRetry(operation: () => Promise<void>): Promise<void> {
    const attempts = Math.max(1, this.options.maxRetries ?? 3);
    const baseDelay = Math.max(1, this.options.retryBackoffMs ?? 100);
    let lastError: unknown;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await operation();
        return;
      } catch (error) {
        lastError = error;
        if (attempt === attempts) {
          break;
        }
        const delay = baseDelay * Math.pow(2, attempt - 1);
        this.logger.warn({ err: error, attempt }, "Event publish failed, retrying");
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
    throw lastError instanceof Error ? lastError : new Error("Failed to publish event");
  }
}

export type EventBusConfig = {
  driver: EventBusDriver;
  kafkaBrokers: string[];
  kafkaTopic: string;
  clientId: string;
  maxRetries: number;
  retryDelayMs: number;
};

export function createEventBus(config: EventBusConfig, logger?: BusLogger): EventBus {
  if (config.driver === "kafka") {
    if (!config.kafkaBrokers.length) {
      throw new Error("KAFKA_BROKERS must be set when EVENT_BUS_DRIVER=kafka");
    }
    return new EventBus({
      driver: "kafka",
      kafka: {
        brokers: config.kafkaBrokers,
        topic: config.kafkaTopic,
        clientId: config.clientId,
      },
      logger,
      maxRetries: config.maxRetries,
      retryBackoffMs: config.retryDelayMs,
    });
  }
  return new EventBus({ driver: "memory", logger });
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type DomainEventInput = DistributiveOmit<DomainEvent, "eventId" | "occurredAt" | "schemaVersion" | "source"> & {
  eventId?: string;
  occurredAt?: string;
  schemaVersion?: string;
  source?: string;
};

export function createDomainEvent(partial: DomainEventInput): DomainEvent {
  return domainEventSchema.parse({
    ...partial,
    eventId: partial.eventId ?? randomUUID(),
    occurredAt: partial.occurredAt ?? new Date().toISOString(),
    schemaVersion: partial.schemaVersion ?? "1.0",
    source: partial.source ?? EVENT_SOURCE,
  });
}
