import type { Express, RequestHandler } from "express";
import { z } from "zod";
import type { Logger } from "pino";

import {
  coverageFeeOverrideSchema,
  insertDeliveryAgentSchema,
  insertZipAreaSchema,
  updateDeliverySettingsSchema,
} from "@shared/schema";
import type { IStorage } from "../storage";
import type { AgentService } from "../services/agents";
import type { AgentStatsService } from "../services/agent-stats";
import type { AssignmentService } from "../services/assignment";
import type { DeliveryService } from "../services/deliveries";
import { sendError, sendTransition } from "./responses";

const coordinatesSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

const dispatchOrderSchema = z.object({
  orderId: z.string().min(1).max(64),
  totalAmount: z.number().nonnegative().optional().nullable(),
  zipAreaId: z.string().uuid().optional().nullable(),
  storeLocation: coordinatesSchema.optional().nullable(),
  dropoffLocation: coordinatesSchema.optional().nullable(),
});

const agentParamsSchema = z.object({
  agentId: z.string().uuid(),
});

const coverageParamsSchema = agentParamsSchema.extend({
  zipAreaId: z.string().uuid(),
});

const adminCancelSchema = z.object({
  reason: z.string().trim().max(500).optional(),
});

interface DispatchRouteDeps {
  app: Express;
  storage: IStorage;
  agents: AgentService;
  deliveries: DeliveryService;
  assignment: AssignmentService;
  stats: AgentStatsService;
  requireAdmin: RequestHandler;
  logger: Logger;
}

export function registerDispatchRoutes({
  app,
  storage,
  agents,
  deliveries,
  assignment,
  stats,
  requireAdmin,
  logger,
}: DispatchRouteDeps) {
  app.post("/api/dispatch/orders", requireAdmin, async (req, res) => {
    try {
      const order = dispatchOrderSchema.parse(req.body);
      const delivery = await assignment.assignOrder(order);
      if (!delivery) {
        return res.status(503).json({ message: "No delivery agent is available right now. Please try again shortly." });
      }
      // OTPs are handed to the store and the customer by the caller
      res.status(201).json(delivery);
    } catch (error) {
      sendError(res, error, logger, "Failed to dispatch order");
    }
  });

  app.post("/api/dispatch/deliveries/:deliveryCode/cancel", requireAdmin, async (req, res) => {
    try {
      const { reason } = adminCancelSchema.parse(req.body ?? {});
      sendTransition(res, await deliveries.cancel(req.params.deliveryCode, { actorType: "admin" }, reason));
    } catch (error) {
      sendError(res, error, logger, "Failed to cancel delivery");
    }
  });

  app.post("/api/agents", requireAdmin, async (req, res) => {
    try {
      const input = insertDeliveryAgentSchema.parse(req.body);
      const agent = await agents.registerAgent(input);
      res.status(201).json(agent);
    } catch (error) {
      sendError(res, error, logger, "Failed to register delivery agent");
    }
  });

  app.post("/api/agents/:agentId/stats/recompute", requireAdmin, async (req, res) => {
    try {
      const { agentId } = agentParamsSchema.parse(req.params);
      res.json(await stats.recomputeAll(agentId));
    } catch (error) {
      sendError(res, error, logger, "Failed to recompute agent stats");
    }
  });

  app.put("/api/agents/:agentId/zip-coverage/:zipAreaId/fee-override", requireAdmin, async (req, res) => {
    try {
      const { agentId, zipAreaId } = coverageParamsSchema.parse(req.params);
      const { deliveryFeeOverride } = coverageFeeOverrideSchema.parse(req.body);
      res.json(await agents.setCoverageFeeOverride(agentId, zipAreaId, deliveryFeeOverride));
    } catch (error) {
      sendError(res, error, logger, "Failed to update coverage fee override");
    }
  });

  app.post("/api/zip-areas", requireAdmin, async (req, res) => {
    try {
      const input = insertZipAreaSchema.parse(req.body);
      res.status(201).json(await storage.createZipArea(input));
    } catch (error) {
      sendError(res, error, logger, "Failed to create ZIP area");
    }
  });

  app.get("/api/delivery-settings", requireAdmin, async (_req, res) => {
    try {
      res.json(deliveries.getSettings() ?? (await deliveries.reloadSettings()));
    } catch (error) {
      sendError(res, error, logger, "Failed to load delivery settings");
    }
  });

  app.put("/api/delivery-settings", requireAdmin, async (req, res) => {
    try {
      const patch = updateDeliverySettingsSchema.parse(req.body);
      res.json(await deliveries.updateSettings(patch));
    } catch (error) {
      sendError(res, error, logger, "Failed to update delivery settings");
    }
  });
}
