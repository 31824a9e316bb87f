import { randomInt } from "node:crypto";
import type { Logger } from "pino";

import type { Delivery, DeliveryAgent } from "@shared/schema";
import type { IStorage } from "../storage";
import { distanceBetween, type Coordinates } from "../utils/geolocation";
import type { DeliveryService } from "./deliveries";
import { DuplicateDeliveryError } from "./errors";

export type OrderRef = {
  orderId: string;
  totalAmount?: number | null;
  zipAreaId?: string | null;
  storeLocation?: Coordinates | null;
  dropoffLocation?: Coordinates | null;
};

interface AssignmentServiceDeps {
  storage: IStorage;
  deliveries: DeliveryService;
  logger: Logger;
  random?: (max: number) => number;
}

/**
 * Hands an order to one of the agents that are available and active.
 *
 * The pick is uniformly random. Capacity, distance and ZIP coverage are not
 * considered yet.
 */
export class AssignmentService {
  private readonly storage: IStorage;
  private readonly deliveries: DeliveryService;
  private readonly logger: Logger;
  private readonly random: (max: number) => number;

  constructor({ storage, deliveries, logger, random }: AssignmentServiceDeps) {
    this.storage = storage;
    this.deliveries = deliveries;
    this.logger = logger;
    this.random = random ?? ((max) => randomInt(max));
  }

  async eligibleAgents(): Promise<DeliveryAgent[]> {
    return this.storage.getAvailableAgents();
  }

  /** Null when nobody can take the order; nothing is written in that case. */
  async assignOrder(order: OrderRef): Promise<Delivery | null> {
    if (await this.storage.getDeliveryByOrderId(order.orderId)) {
      throw new DuplicateDeliveryError(order.orderId);
    }

    const pool = await this.eligibleAgents();
    if (!pool.length) {
      this.logger.warn({ orderId: order.orderId }, "no eligible delivery agent");
      return null;
    }
    const agent = pool[this.random(pool.length)];
    if (!agent) {
      throw new Error(`Random index out of range for a pool of ${pool.length}`);
    }

    const distanceKm =
      order.storeLocation && order.dropoffLocation
        ? distanceBetween(order.storeLocation, order.dropoffLocation)
        : null;

    const delivery = await this.deliveries.createDelivery({
      orderId: order.orderId,
      agentId: agent.id,
      orderValue: order.totalAmount,
      distanceKm,
      zipAreaId: order.zipAreaId,
    });
    this.logger.info(
      { orderId: order.orderId, agentId: agent.id, deliveryCode: delivery.deliveryCode, poolSize: pool.length },
      "order assigned",
    );
    return delivery;
  }
}
