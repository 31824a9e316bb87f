import type { Express } from "express";
import type { Logger } from "pino";

import { insertDeliveryRatingSchema } from "@shared/schema";
import type { DeliveryService } from "../services/deliveries";
import { sendError } from "./responses";

interface TrackingRouteDeps {
  app: Express;
  deliveries: DeliveryService;
  logger: Logger;
}

// Public: the delivery code is what customers get with their order
export function registerTrackingRoutes({ app, deliveries, logger }: TrackingRouteDeps) {
  app.get("/api/track/:deliveryCode", async (req, res) => {
    try {
      res.json(await deliveries.trackDelivery(req.params.deliveryCode));
    } catch (error) {
      sendError(res, error, logger, "Failed to load delivery tracking");
    }
  });

  app.post("/api/track/:deliveryCode/rating", async (req, res) => {
    try {
      const input = insertDeliveryRatingSchema.parse(req.body);
      const rating = await deliveries.submitRating(req.params.deliveryCode, input);
      res.status(201).json({ message: "Thank you for your feedback!", rating });
    } catch (error) {
      sendError(res, error, logger, "Failed to submit rating");
    }
  });
}
