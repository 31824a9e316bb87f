import express from "express";
import pino from "pino";

import type { DomainEvent } from "@shared/events";
import type { InsertDeliveryAgent } from "@shared/schema";
import { MemStorage } from "./storage";
import { createServices, registerRoutes, type AppServices } from "./routes";
import { EventBus } from "./services/event-bus";
import type { DeliverySettings } from "./services/fee-calculator";

export const silentLogger = pino({ level: "silent" });

export function createRecordingBus(): { bus: EventBus; events: DomainEvent[] } {
  const events: DomainEvent[] = [];
  const bus = new EventBus({ driver: "memory", logger: silentLogger });
  bus.on((event) => {
    events.push(event);
  });
  return { bus, events };
}

export type TestContext = AppServices & {
  storage: MemStorage;
  events: DomainEvent[];
  bus: EventBus;
};

export async function createTestContext(
  options: { settings?: DeliverySettings | null; now?: () => Date } = {},
): Promise<TestContext> {
  const storage = new MemStorage();
  const { bus, events } = createRecordingBus();
  const settings =
    options.settings === null ? undefined : (options.settings ?? (await storage.getOrCreateDeliverySettings()));
  const services = createServices({
    storage,
    eventBus: bus,
    logger: silentLogger,
    settings,
    now: options.now,
  });
  return { ...services, storage, events, bus };
}

export function agentInput(suffix: string, overrides: Partial<InsertDeliveryAgent> = {}): InsertDeliveryAgent {
  return {
    userId: `user-${suffix}`,
    storeId: "store-1",
    phoneNumber: "5550100",
    ...overrides,
  };
}

/** Registers an agent with one active ZIP area and switches it on. */
export async function onlineAgent(ctx: TestContext, suffix: string, zipCode = `100${suffix.padStart(2, "0")}`) {
  const agent = await ctx.agents.registerAgent(agentInput(suffix));
  const area = await ctx.storage.createZipArea({ zipCode });
  await ctx.agents.updateZipCoverage(agent.id, [area.id]);
  const available = await ctx.agents.toggleAvailability(agent.id);
  return { agent: available, area };
}

export const ADMIN_TOKEN = "test-secret";

/** Express app wired like the server, sharing storage and bus with the returned context. */
export async function createTestApp(options: { adminToken?: string | null } = {}) {
  const ctx = await createTestContext();
  const app = express();
  app.use(express.json());
  await registerRoutes(app, {
    storage: ctx.storage,
    eventBus: ctx.bus,
    logger: silentLogger,
    settings: ctx.deliveries.getSettings(),
    adminToken: options.adminToken === null ? undefined : (options.adminToken ?? ADMIN_TOKEN),
  });
  return { app, ctx };
}
