import type { Express } from "express";
import { createServer, type Server } from "http";
import type { Logger } from "pino";

import type { IStorage } from "./storage";
import { createRequireAdmin, createRequireAgent } from "./middleware/agent-auth";
import { AgentService } from "./services/agents";
import { AgentStatsService } from "./services/agent-stats";
import { AssignmentService } from "./services/assignment";
import { DeliveryService } from "./services/deliveries";
import type { EventPublisher } from "./services/event-bus";
import type { DeliverySettings } from "./services/fee-calculator";
import { registerAgentRoutes } from "./routes/agent";
import { registerDispatchRoutes } from "./routes/dispatch";
import { registerHealthRoutes } from "./routes/health";
import { registerTrackingRoutes } from "./routes/tracking";

export interface ServiceOptions {
  storage: IStorage;
  eventBus: EventPublisher;
  logger: Logger;
  settings?: DeliverySettings;
  now?: () => Date;
  random?: (max: number) => number;
}

export type AppServices = {
  stats: AgentStatsService;
  agents: AgentService;
  deliveries: DeliveryService;
  assignment: AssignmentService;
};

export function createServices({ storage, eventBus, logger, settings, now, random }: ServiceOptions): AppServices {
  const stats = new AgentStatsService({ storage, logger });
  const agents = new AgentService({ storage, logger, events: eventBus, random });
  const deliveries = new DeliveryService({ storage, logger, events: eventBus, stats, settings, now, random });
  const assignment = new AssignmentService({ storage, deliveries, logger, random });
  return { stats, agents, deliveries, assignment };
}

interface RegisterRoutesOptions extends ServiceOptions {
  adminToken?: string;
  ping?: () => Promise<void>;
}

export async function registerRoutes(app: Express, options: RegisterRoutesOptions): Promise<Server> {
  const { storage, logger, adminToken, ping } = options;
  const services = createServices(options);
  const requireAgent = createRequireAgent(storage, logger);
  const requireAdmin = createRequireAdmin(adminToken);

  registerHealthRoutes({ app, logger, ping });
  registerTrackingRoutes({ app, deliveries: services.deliveries, logger });
  registerAgentRoutes({ app, agents: services.agents, deliveries: services.deliveries, requireAgent, logger });
  registerDispatchRoutes({ app, storage, ...services, requireAdmin, logger });

  return createServer(app);
}
