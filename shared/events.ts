import { z } from "zod";

import { agentStatusEnum, deliveryStatusEnum } from "./schema";

const actorSchema = z
  .object({
    actorId: z.string().min(1).optional(),
    actorType: z.enum(["system", "agent", "customer", "admin"]).optional(),
  })
  .strict();

const baseEventSchema = z.object({
  eventId: z.string().uuid(),
  occurredAt: z.string().datetime(),
  source: z.string().min(1),
  schemaVersion: z.string().min(1),
  actor: actorSchema.optional(),
});

// Never carries OTP values; strict() rejects unknown keys
const deliveryLifecyclePayloadSchema = z
  .object({
    deliveryId: z.string().min(1),
    orderId: z.string().min(1),
    agentId: z.string().min(1),
    status: z.enum(deliveryStatusEnum),
    previousStatus: z.enum(deliveryStatusEnum).optional().nullable(),
    deliveryFee: z.number().nonnegative().optional(),
    agentPayout: z.number().nonnegative().optional(),
    rating: z.number().int().min(1).max(5).optional(),
  })
  .strict();

const agentTelemetryPayloadSchema = z
  .object({
    agentId: z.string().min(1),
    lat: z.number().optional(),
    lng: z.number().optional(),
    deliveryId: z.string().optional().nullable(),
    isAvailable: z.boolean().optional(),
    status: z.enum(agentStatusEnum).optional(),
  })
  .strict();

export const deliveryLifecycleEventSchema = baseEventSchema.extend({
  category: z.literal("delivery.lifecycle"),
  name: z.enum(["created", "status_changed", "rated"]),
  payload: deliveryLifecyclePayloadSchema,
});

export const agentTelemetryEventSchema = baseEventSchema.extend({
  category: z.literal("agent.telemetry"),
  name: z.enum(["location_updated", "availability_changed"]),
  payload: agentTelemetryPayloadSchema,
});

export const domainEventSchema = z.discriminatedUnion("category", [
  deliveryLifecycleEventSchema,
  agentTelemetryEventSchema,
]);

export type DomainEvent = z.infer<typeof domainEventSchema>;
export type DeliveryLifecycleEvent = z.infer<typeof deliveryLifecycleEventSchema>;
export type AgentTelemetryEvent = z.infer<typeof agentTelemetryEventSchema>;

export type DomainEventCategory = DomainEvent["category"];
