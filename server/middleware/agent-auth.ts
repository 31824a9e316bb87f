import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";

import type { DeliveryAgent } from "@shared/schema";
import type { IStorage } from "../storage";

export const AGENT_HEADER = "x-agent-id";
export const ADMIN_HEADER = "x-admin-token";

const agentIdSchema = z.string().uuid();

/**
 * Resolves the calling agent from the header the gateway sets after it has
 * authenticated the user. Sessions and credentials are handled upstream.
 */
export function createRequireAgent(storage: IStorage, logger: Logger): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const agentId = req.header(AGENT_HEADER);
    if (!agentId) {
      return res.status(401).json({ message: "Agent authentication required" });
    }
    // Agent ids are uuids; anything else cannot name a profile
    if (!agentIdSchema.safeParse(agentId).success) {
      return res.status(403).json({ message: "Delivery agent profile not found" });
    }
    try {
      const agent = await storage.getDeliveryAgent(agentId);
      if (!agent) {
        return res.status(403).json({ message: "Delivery agent profile not found" });
      }
      req.agent = agent;
      next();
    } catch (error) {
      logger.error({ err: error, agentId }, "failed to resolve delivery agent");
      res.status(500).json({ message: "Failed to resolve delivery agent" });
    }
  };
}

export function requireAgentContext(req: Request): DeliveryAgent {
  if (!req.agent) {
    throw new Error("requireAgent middleware did not run for this route");
  }
  return req.agent;
}

export function createRequireAdmin(adminToken: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!adminToken) {
      return res.status(503).json({ message: "Admin access is not configured" });
    }
    if (req.header(ADMIN_HEADER) !== adminToken) {
      return res.status(403).json({ message: "Admin access required" });
    }
    next();
  };
}
