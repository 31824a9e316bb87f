import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  varchar,
  numeric,
  integer,
  timestamp,
  boolean,
  index,
  uniqueIndex,
  pgEnum,
  uuid,
  serial,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

const enumType = pgEnum;
const timestamptz = (name: string) => timestamp(name, { withTimezone: true });
const uuidFn = sql`gen_random_uuid()`;
const money = (name: string) => numeric(name, { precision: 10, scale: 2 });
const coordinate = (name: string) => numeric(name, { precision: 10, scale: 7 });

export const agentStatusEnum = ["active", "offline", "on_break", "busy"] as const;
export const vehicleTypeEnum = ["bicycle", "scooter", "motorcycle", "car", "van"] as const;
export const deliveryStatusEnum = [
  "assigned",
  "accepted",
  "at_store",
  "picked_up",
  "in_transit",
  "delivered",
  "cancelled",
  "failed",
] as const;
export const deliveryIssueTypeEnum = [
  "delay",
  "damage",
  "location",
  "customer",
  "traffic",
  "vehicle",
  "weather",
  "other",
] as const;
export const feeCalculationMethodEnum = ["fixed", "distance", "order_value"] as const;

export const agentStatus = enumType("agent_status", agentStatusEnum);
export const vehicleType = enumType("vehicle_type", vehicleTypeEnum);
export const deliveryStatus = enumType("delivery_status", deliveryStatusEnum);
export const deliveryIssueType = enumType("delivery_issue_type", deliveryIssueTypeEnum);
export const feeCalculationMethod = enumType("fee_calculation_method", feeCalculationMethodEnum);

export const zipAreas = pgTable("zip_areas", {
  id: uuid("id").primaryKey().default(uuidFn),
  zipCode: varchar("zip_code", { length: 10 }).notNull().unique(),
  name: text("name"),
  isActive: boolean("is_active").default(true).notNull(),
  createdAt: timestamptz("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
});

export const deliveryAgents = pgTable("delivery_agents", {
  id: uuid("id").primaryKey().default(uuidFn),
  agentCode: varchar("agent_code", { length: 20 }).notNull().unique(),
  // Users and stores live in other services; these are their opaque ids
  userId: varchar("user_id", { length: 64 }).notNull().unique(),
  storeId: varchar("store_id", { length: 64 }).notNull(),
  phoneNumber: varchar("phone_number", { length: 15 }).notNull(),
  alternativePhone: varchar("alternative_phone", { length: 15 }),
  status: agentStatus("status").notNull().default("offline"),
  isAvailable: boolean("is_available").default(false).notNull(),
  maxConcurrentOrders: integer("max_concurrent_orders").default(3).notNull(),
  serviceAreaRadius: integer("service_area_radius").default(10).notNull(), // in kilometers
  vehicleType: vehicleType("vehicle_type").notNull().default("scooter"),
  vehicleNumber: varchar("vehicle_number", { length: 20 }),
  currentLatitude: coordinate("current_latitude"),
  currentLongitude: coordinate("current_longitude"),
  lastLocationUpdate: timestamptz("last_location_update"),
  totalDeliveries: integer("total_deliveries").default(0).notNull(),
  successfulDeliveries: integer("successful_deliveries").default(0).notNull(),
  failedDeliveries: integer("failed_deliveries").default(0).notNull(),
  totalEarnings: money("total_earnings").default("0.00").notNull(),
  averageRating: numeric("average_rating", { precision: 3, scale: 2 }).default("0.00").notNull(),
  createdAt: timestamptz("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  updatedAt: timestamptz("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
}, (table) => ({
  deliveryAgentsAvailabilityIdx: index("delivery_agents_availability_idx").on(table.isAvailable, table.status),
}));

// Soft-deactivated, never deleted, so past coverage stays auditable
export const agentZipCoverages = pgTable("agent_zip_coverages", {
  id: uuid("id").primaryKey().default(uuidFn),
  agentId: uuid("agent_id").references(() => deliveryAgents.id, { onDelete: "cascade" }).notNull(),
  zipAreaId: uuid("zip_area_id").references(() => zipAreas.id, { onDelete: "cascade" }).notNull(),
  isActive: boolean("is_active").default(true).notNull(),
  deliveryFeeOverride: numeric("delivery_fee_override", { precision: 6, scale: 2 }),
  createdAt: timestamptz("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  updatedAt: timestamptz("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
}, (table) => ({
  agentZipCoveragesUnique: uniqueIndex("agent_zip_coverages_agent_zip_unique").on(
    table.agentId,
    table.zipAreaId,
  ),
}));

export const deliveries = pgTable("deliveries", {
  id: uuid("id").primaryKey().default(uuidFn),
  orderId: varchar("order_id", { length: 64 }).notNull().unique(),
  agentId: uuid("agent_id").references(() => deliveryAgents.id, { onDelete: "cascade" }).notNull(),
  deliveryCode: varchar("delivery_code", { length: 30 }).notNull().unique(),
  status: deliveryStatus("status").notNull().default("assigned"),
  deliveryFee: money("delivery_fee").default("0.00").notNull(),
  agentPayout: money("agent_payout").default("0.00").notNull(),
  assignedAt: timestamptz("assigned_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  acceptedAt: timestamptz("accepted_at"),
  arrivedAtStoreAt: timestamptz("arrived_at_store_at"),
  pickedUpAt: timestamptz("picked_up_at"),
  deliveredAt: timestamptz("delivered_at"),
  storePickupOtp: varchar("store_pickup_otp", { length: 6 }).notNull(),
  customerDeliveryOtp: varchar("customer_delivery_otp", { length: 6 }).notNull(),
  storePickupVerified: boolean("store_pickup_verified").default(false).notNull(),
  customerDeliveryVerified: boolean("customer_delivery_verified").default(false).notNull(),
  createdAt: timestamptz("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  updatedAt: timestamptz("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
}, (table) => ({
  deliveriesAgentStatusIdx: index("deliveries_agent_status_idx").on(table.agentId, table.status),
}));

export const deliveryTracking = pgTable("delivery_tracking", {
  id: uuid("id").primaryKey().default(uuidFn),
  deliveryId: uuid("delivery_id").references(() => deliveries.id, { onDelete: "cascade" }).notNull(),
  latitude: coordinate("latitude").notNull(),
  longitude: coordinate("longitude").notNull(),
  recordedAt: timestamptz("recorded_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  // Insertion order; breaks ties between points recorded in the same millisecond
  sequence: serial("sequence"),
}, (table) => ({
  deliveryTrackingDeliveryIdx: index("delivery_tracking_delivery_idx").on(
    table.deliveryId,
    table.recordedAt,
    table.sequence,
  ),
}));

export const deliveryIssues = pgTable("delivery_issues", {
  id: uuid("id").primaryKey().default(uuidFn),
  deliveryId: uuid("delivery_id").references(() => deliveries.id, { onDelete: "cascade" }).notNull(),
  issueType: deliveryIssueType("issue_type").notNull(),
  description: text("description").notNull(),
  resolved: boolean("resolved").default(false).notNull(),
  resolution: text("resolution"),
  createdAt: timestamptz("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
});

export const deliveryRatings = pgTable("delivery_ratings", {
  id: uuid("id").primaryKey().default(uuidFn),
  deliveryId: uuid("delivery_id").references(() => deliveries.id, { onDelete: "cascade" }).notNull().unique(),
  rating: integer("rating").notNull(),
  feedback: text("feedback"),
  createdAt: timestamptz("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
});

export const deliverySettings = pgTable("delivery_settings", {
  id: uuid("id").primaryKey().default(uuidFn),
  singletonKey: varchar("singleton_key", { length: 16 }).notNull().default("default").unique(),
  calculationMethod: feeCalculationMethod("calculation_method").notNull().default("fixed"),
  baseDeliveryFee: money("base_delivery_fee").default("40.00").notNull(),
  feePerKm: numeric("fee_per_km", { precision: 5, scale: 2 }).default("5.00").notNull(),
  minimumDeliveryFee: money("minimum_delivery_fee").default("30.00").notNull(),
  maximumDeliveryFee: money("maximum_delivery_fee").default("150.00").notNull(),
  freeDeliveryThreshold: money("free_delivery_threshold").default("500.00").notNull(),
  agentPayoutPercentage: numeric("agent_payout_percentage", { precision: 5, scale: 2 }).default("80.00").notNull(),
  updatedAt: timestamptz("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
});

// Largest values the numeric(p, 2) columns hold
const MONEY_MAX = 99999999.99; // numeric(10,2)
const RATE_MAX = 999.99; // numeric(5,2)
const FEE_OVERRIDE_MAX = 9999.99; // numeric(6,2)

const decimalString = (max: number) =>
  z
    .union([z.string(), z.number()])
    .refine((val) => /^[0-9]+(\.[0-9]+)?$/.test(val.toString()), {
      message: "Amount must be a valid non-negative number",
    })
    .transform((val) => Number(val).toFixed(2))
    .refine((val) => Number(val) <= max, {
      message: `Amount cannot exceed ${max.toFixed(2)}`,
    });

export const insertDeliveryAgentSchema = createInsertSchema(deliveryAgents)
  .omit({
    id: true,
    agentCode: true,
    status: true,
    isAvailable: true,
    currentLatitude: true,
    currentLongitude: true,
    lastLocationUpdate: true,
    totalDeliveries: true,
    successfulDeliveries: true,
    failedDeliveries: true,
    totalEarnings: true,
    averageRating: true,
    createdAt: true,
    updatedAt: true,
  })
  .extend({
    userId: z.string().min(1).max(64),
    storeId: z.string().min(1).max(64),
    phoneNumber: z.string().min(5).max(15),
    maxConcurrentOrders: z.number().int().min(0).optional(),
    serviceAreaRadius: z.number().int().min(0).optional(),
  });

export const insertZipAreaSchema = createInsertSchema(zipAreas).omit({
  id: true,
  createdAt: true,
});

export const insertDeliveryIssueSchema = createInsertSchema(deliveryIssues)
  .omit({
    id: true,
    deliveryId: true,
    resolved: true,
    resolution: true,
    createdAt: true,
  })
  .extend({
    description: z.string().trim().min(1),
  });

export const insertDeliveryRatingSchema = createInsertSchema(deliveryRatings)
  .omit({
    id: true,
    deliveryId: true,
    createdAt: true,
  })
  .extend({
    rating: z.number().int().min(1).max(5),
    feedback: z.string().trim().max(2000).optional().nullable(),
  });

export const updateDeliverySettingsSchema = z
  .object({
    calculationMethod: z.enum(feeCalculationMethodEnum),
    baseDeliveryFee: decimalString(MONEY_MAX),
    feePerKm: decimalString(RATE_MAX),
    minimumDeliveryFee: decimalString(MONEY_MAX),
    maximumDeliveryFee: decimalString(MONEY_MAX),
    freeDeliveryThreshold: decimalString(MONEY_MAX),
    agentPayoutPercentage: decimalString(RATE_MAX).refine((val) => Number(val) <= 100, {
      message: "Payout percentage must be between 0 and 100",
    }),
  })
  .partial();

export const coverageFeeOverrideSchema = z.object({
  deliveryFeeOverride: decimalString(FEE_OVERRIDE_MAX).nullable(),
});

export type ZipArea = typeof zipAreas.$inferSelect;
export type InsertZipArea = z.infer<typeof insertZipAreaSchema>;

export type DeliveryAgent = typeof deliveryAgents.$inferSelect;
export type InsertDeliveryAgent = z.infer<typeof insertDeliveryAgentSchema>;

export type AgentZipCoverage = typeof agentZipCoverages.$inferSelect;

export type Delivery = typeof deliveries.$inferSelect;
export type InsertDelivery = typeof deliveries.$inferInsert;

export type DeliveryTrackingPoint = typeof deliveryTracking.$inferSelect;

export type DeliveryIssue = typeof deliveryIssues.$inferSelect;
export type InsertDeliveryIssue = z.infer<typeof insertDeliveryIssueSchema>;

export type DeliveryRating = typeof deliveryRatings.$inferSelect;
export type InsertDeliveryRating = z.infer<typeof insertDeliveryRatingSchema>;

export type DeliverySettingsRow = typeof deliverySettings.$inferSelect;
export type UpdateDeliverySettings = z.infer<typeof updateDeliverySettingsSchema>;

export type AgentStatus = typeof agentStatusEnum[number];
export type VehicleType = typeof vehicleTypeEnum[number];
export type DeliveryStatus = typeof deliveryStatusEnum[number];
export type DeliveryIssueType = typeof deliveryIssueTypeEnum[number];
export type FeeCalculationMethod = typeof feeCalculationMethodEnum[number];
