import type { Express, RequestHandler } from "express";
import { z } from "zod";
import type { Logger } from "pino";

import { agentStatusEnum, insertDeliveryIssueSchema } from "@shared/schema";
import { requireAgentContext } from "../middleware/agent-auth";
import type { AgentService } from "../services/agents";
import { deliveryListFilters, type ActorScope, type DeliveryService } from "../services/deliveries";
import { sendError, sendTransition } from "./responses";

const otpSchema = z.object({
  otp: z.string().regex(/^\d{6}$/, "OTP must be 6 digits"),
});

const cancelSchema = z.object({
  reason: z.string().trim().max(500).optional(),
});

const failSchema = z.object({
  reason: z.string().trim().min(1).max(500),
});

const statusSchema = z.object({
  status: z.enum(agentStatusEnum),
});

const zipCoverageSchema = z.object({
  zipAreaIds: z.array(z.string().uuid()),
});

const locationSchema = z.object({
  latitude: z.coerce.number().min(-90).max(90),
  longitude: z.coerce.number().min(-180).max(180),
  deliveryCode: z.string().min(1).optional().nullable(),
});

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

const listQuerySchema = z.object({
  status: z.enum(deliveryListFilters).default("all"),
  from: isoDate.optional(),
  to: isoDate.optional(),
});

const earningsQuerySchema = z.object({
  from: isoDate.optional(),
  to: isoDate.optional(),
});

interface AgentRouteDeps {
  app: Express;
  agents: AgentService;
  deliveries: DeliveryService;
  requireAgent: RequestHandler;
  logger: Logger;
}

export function registerAgentRoutes({ app, agents, deliveries, requireAgent, logger }: AgentRouteDeps) {
  const scopeOf = (agentId: string): ActorScope => ({ agentId, actorType: "agent" });

  app.get("/api/agent/me", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      const [profile, coverages] = await Promise.all([
        agents.getProfile(agent.id),
        agents.getActiveCoverages(agent.id),
      ]);
      res.json({ ...profile, activeZipAreaIds: coverages.map((coverage) => coverage.zipAreaId) });
    } catch (error) {
      sendError(res, error, logger, "Failed to load agent profile");
    }
  });

  app.get("/api/agent/dashboard", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      res.json(await deliveries.getDashboard(agent.id));
    } catch (error) {
      sendError(res, error, logger, "Failed to load dashboard");
    }
  });

  app.get("/api/agent/deliveries", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      const query = listQuerySchema.parse(req.query);
      const list = await deliveries.listAgentDeliveries(agent.id, {
        filter: query.status,
        from: query.from,
        to: query.to,
      });
      res.json({ status: query.status, ...list });
    } catch (error) {
      sendError(res, error, logger, "Failed to load deliveries");
    }
  });

  app.get("/api/agent/deliveries/:deliveryCode", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      res.json(await deliveries.getAgentDelivery(req.params.deliveryCode, agent.id));
    } catch (error) {
      sendError(res, error, logger, "Failed to load delivery");
    }
  });

  app.post("/api/agent/deliveries/:deliveryCode/accept", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      sendTransition(res, await deliveries.accept(req.params.deliveryCode, scopeOf(agent.id)));
    } catch (error) {
      sendError(res, error, logger, "Failed to accept delivery");
    }
  });

  app.post("/api/agent/deliveries/:deliveryCode/arrive", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      sendTransition(res, await deliveries.arriveAtStore(req.params.deliveryCode, scopeOf(agent.id)));
    } catch (error) {
      sendError(res, error, logger, "Failed to update delivery");
    }
  });

  app.post("/api/agent/deliveries/:deliveryCode/pickup", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      const { otp } = otpSchema.parse(req.body);
      sendTransition(res, await deliveries.pickup(req.params.deliveryCode, otp, scopeOf(agent.id)));
    } catch (error) {
      sendError(res, error, logger, "Failed to confirm pickup");
    }
  });

  app.post("/api/agent/deliveries/:deliveryCode/in-transit", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      sendTransition(res, await deliveries.markInTransit(req.params.deliveryCode, scopeOf(agent.id)));
    } catch (error) {
      sendError(res, error, logger, "Failed to update delivery");
    }
  });

  app.post("/api/agent/deliveries/:deliveryCode/complete", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      const { otp } = otpSchema.parse(req.body);
      sendTransition(res, await deliveries.complete(req.params.deliveryCode, otp, scopeOf(agent.id)));
    } catch (error) {
      sendError(res, error, logger, "Failed to complete delivery");
    }
  });

  app.post("/api/agent/deliveries/:deliveryCode/cancel", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      const { reason } = cancelSchema.parse(req.body ?? {});
      sendTransition(res, await deliveries.cancel(req.params.deliveryCode, scopeOf(agent.id), reason));
    } catch (error) {
      sendError(res, error, logger, "Failed to cancel delivery");
    }
  });

  app.post("/api/agent/deliveries/:deliveryCode/fail", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      const { reason } = failSchema.parse(req.body);
      sendTransition(res, await deliveries.fail(req.params.deliveryCode, scopeOf(agent.id), reason));
    } catch (error) {
      sendError(res, error, logger, "Failed to mark delivery as failed");
    }
  });

  app.post("/api/agent/deliveries/:deliveryCode/issues", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      const input = insertDeliveryIssueSchema.parse(req.body);
      const issue = await deliveries.reportIssue(req.params.deliveryCode, scopeOf(agent.id), input);
      res.status(201).json(issue);
    } catch (error) {
      sendError(res, error, logger, "Failed to report issue");
    }
  });

  app.post("/api/agent/availability/toggle", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      const updated = await agents.toggleAvailability(agent.id);
      res.json({ success: true, isAvailable: updated.isAvailable, status: updated.status });
    } catch (error) {
      sendError(res, error, logger, "Failed to toggle availability");
    }
  });

  app.put("/api/agent/status", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      const { status } = statusSchema.parse(req.body);
      const updated = await agents.setStatus(agent.id, status);
      res.json({ success: true, status: updated.status });
    } catch (error) {
      sendError(res, error, logger, "Failed to update status");
    }
  });

  app.get("/api/agent/zip-coverage", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      res.json(await agents.getActiveCoverages(agent.id));
    } catch (error) {
      sendError(res, error, logger, "Failed to load ZIP coverage");
    }
  });

  app.put("/api/agent/zip-coverage", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      const { zipAreaIds } = zipCoverageSchema.parse(req.body);
      const coverages = await agents.updateZipCoverage(agent.id, zipAreaIds);
      res.json(coverages);
    } catch (error) {
      sendError(res, error, logger, "Failed to update ZIP coverage");
    }
  });

  app.post("/api/agent/location", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      const input = locationSchema.parse(req.body);
      const result = await agents.updateLocation(agent.id, input);
      res.json({ success: true, tracked: result.trackingPoint !== null });
    } catch (error) {
      sendError(res, error, logger, "Failed to update location");
    }
  });

  app.get("/api/agent/earnings", requireAgent, async (req, res) => {
    try {
      const agent = requireAgentContext(req);
      const range = earningsQuerySchema.parse(req.query);
      res.json(await deliveries.getEarnings(agent.id, range));
    } catch (error) {
      sendError(res, error, logger, "Failed to load earnings");
    }
  });
}
