import { randomUUID } from "node:crypto";
import { and, desc, eq, inArray, sql } from "drizzle-orm";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import {
  type AgentZipCoverage,
  type Delivery,
  type DeliveryAgent,
  type DeliveryIssue,
  type DeliveryRating,
  type DeliverySettingsRow,
  type DeliveryStatus,
  type DeliveryTrackingPoint,
  type InsertDeliveryAgent,
  type InsertDeliveryIssue,
  type InsertDeliveryRating,
  type InsertZipArea,
  type UpdateDeliverySettings,
  type ZipArea,
  agentZipCoverages,
  deliveries,
  deliveryAgents,
  deliveryIssues,
  deliveryRatings,
  deliverySettings,
  deliveryTracking,
  zipAreas,
} from "@shared/schema";

import type { DeliveryStatusPatch } from "./services/delivery-state";
import { ZipAreaExistsError } from "./services/errors";
import { DEFAULT_DELIVERY_SETTINGS, type DeliverySettings } from "./services/fee-calculator";

const SETTINGS_KEY = "default";

export type GeoPoint = { latitude: number; longitude: number };

export type AgentPatch = Partial<
  Pick<
    DeliveryAgent,
    | "status"
    | "isAvailable"
    | "maxConcurrentOrders"
    | "serviceAreaRadius"
    | "vehicleType"
    | "vehicleNumber"
    | "phoneNumber"
    | "alternativePhone"
    | "totalDeliveries"
    | "successfulDeliveries"
    | "failedDeliveries"
    | "totalEarnings"
    | "averageRating"
  >
>;

export type AgentSnapshot = {
  agent: DeliveryAgent;
  activeCoverages: AgentZipCoverage[];
};

export type AgentHistory = {
  agent: DeliveryAgent;
  deliveries: Array<Pick<Delivery, "status" | "agentPayout">>;
  ratings: number[];
};

export type NewDelivery = Pick<
  Delivery,
  | "orderId"
  | "agentId"
  | "deliveryCode"
  | "status"
  | "deliveryFee"
  | "agentPayout"
  | "assignedAt"
  | "storePickupOtp"
  | "customerDeliveryOtp"
>;

export type TransitionOptions = {
  // Bumps total/successful counters in the same transaction as the status change
  incrementAgentCounters?: boolean;
  issue?: InsertDeliveryIssue;
  trackAgentLocation?: boolean;
};

export type CoverageChanges = {
  deactivate: string[];
  reactivate: string[];
  create: string[];
};

export type LocationUpdate = GeoPoint & { recordedAt: Date; deliveryCode?: string };

export type LocationUpdateResult = {
  agent: DeliveryAgent;
  trackingPoint: DeliveryTrackingPoint | null;
};

export interface IStorage {
  // ZIP areas
  /** Throws ZipAreaExistsError when the ZIP code is already taken. */
  createZipArea(input: InsertZipArea): Promise<ZipArea>;
  getZipAreasByIds(ids: string[]): Promise<ZipArea[]>;

  // Agents
  createDeliveryAgent(input: InsertDeliveryAgent & { agentCode: string }): Promise<DeliveryAgent | undefined>;
  getDeliveryAgent(id: string): Promise<DeliveryAgent | undefined>;
  getDeliveryAgentByUserId(userId: string): Promise<DeliveryAgent | undefined>;
  getAvailableAgents(): Promise<DeliveryAgent[]>;
  /**
   * Runs `mutate` against a locked snapshot of the agent and its active
   * coverages. If `mutate` throws, nothing is written.
   */
  updateAgentLocked(
    id: string,
    mutate: (snapshot: AgentSnapshot) => AgentPatch,
  ): Promise<DeliveryAgent | undefined>;
  /** Locks the agent, loads its full delivery and rating history and writes back what `compute` returns. */
  updateAgentFromHistory(
    id: string,
    compute: (history: AgentHistory) => AgentPatch,
  ): Promise<DeliveryAgent | undefined>;
  recordAgentLocation(id: string, update: LocationUpdate): Promise<LocationUpdateResult | undefined>;

  // Coverage
  getAgentZipCoverages(agentId: string): Promise<AgentZipCoverage[]>;
  applyCoverageChanges(agentId: string, changes: CoverageChanges): Promise<AgentZipCoverage[]>;
  /** Undefined when the agent has no coverage row for the area. */
  setCoverageFeeOverride(
    agentId: string,
    zipAreaId: string,
    override: string | null,
  ): Promise<AgentZipCoverage | undefined>;

  // Deliveries
  /** Returns undefined when a unique key (order or delivery code) is already taken. */
  createDelivery(input: NewDelivery, initialPoint: GeoPoint): Promise<Delivery | undefined>;
  getDelivery(id: string): Promise<Delivery | undefined>;
  getDeliveryByCode(deliveryCode: string): Promise<Delivery | undefined>;
  getDeliveryByOrderId(orderId: string): Promise<Delivery | undefined>;
  getAgentDeliveries(agentId: string, statuses?: readonly DeliveryStatus[]): Promise<Delivery[]>;
  /**
   * Conditional update: applies `patch` only while the delivery is still in
   * `expectedStatus`. Undefined means another writer moved it first.
   */
  applyDeliveryTransition(
    id: string,
    expectedStatus: DeliveryStatus,
    patch: DeliveryStatusPatch,
    options?: TransitionOptions,
  ): Promise<Delivery | undefined>;

  // Children
  /** Newest first; points recorded in the same instant come back in reverse insertion order. */
  getTrackingPoints(deliveryId: string): Promise<DeliveryTrackingPoint[]>;
  createDeliveryIssue(deliveryId: string, input: InsertDeliveryIssue): Promise<DeliveryIssue>;
  getDeliveryIssues(deliveryId: string): Promise<DeliveryIssue[]>;
  /** Returns undefined when the delivery already has a rating. */
  createDeliveryRating(deliveryId: string, input: InsertDeliveryRating): Promise<DeliveryRating | undefined>;
  getDeliveryRating(deliveryId: string): Promise<DeliveryRating | undefined>;

  // Settings
  getOrCreateDeliverySettings(): Promise<DeliverySettings>;
  updateDeliverySettings(patch: UpdateDeliverySettings): Promise<DeliverySettings>;
}

export function toDeliverySettings(row: DeliverySettingsRow): DeliverySettings {
  return {
    calculationMethod: row.calculationMethod,
    baseDeliveryFee: Number(row.baseDeliveryFee),
    feePerKm: Number(row.feePerKm),
    minimumDeliveryFee: Number(row.minimumDeliveryFee),
    maximumDeliveryFee: Number(row.maximumDeliveryFee),
    freeDeliveryThreshold: Number(row.freeDeliveryThreshold),
    agentPayoutPercentage: Number(row.agentPayoutPercentage),
  };
}

function hasLocation(agent: Pick<DeliveryAgent, "currentLatitude" | "currentLongitude">): agent is DeliveryAgent & {
  currentLatitude: string;
  currentLongitude: string;
} {
  return agent.currentLatitude != null && agent.currentLongitude != null;
}

function byNewestAssignment(a: Delivery, b: Delivery) {
  return b.assignedAt.getTime() - a.assignedAt.getTime();
}

// In-process storage for tests and local runs. Every method reads and writes
// without awaiting in between, so the event loop serializes them the way row
// locks do in PostgreSQL.
export class MemStorage implements IStorage {
  private zipAreas = new Map<string, ZipArea>();
  private agents = new Map<string, DeliveryAgent>();
  private coverages = new Map<string, AgentZipCoverage>();
  private deliveries = new Map<string, Delivery>();
  private tracking: DeliveryTrackingPoint[] = [];
  private trackingSequence = 0;
  private issues: DeliveryIssue[] = [];
  private ratings = new Map<string, DeliveryRating>();
  private settings: DeliverySettingsRow | undefined;

  async createZipArea(input: InsertZipArea): Promise<ZipArea> {
    const existing = Array.from(this.zipAreas.values()).find((area) => area.zipCode === input.zipCode);
    if (existing) {
      throw new ZipAreaExistsError(input.zipCode);
    }
    const area: ZipArea = {
      id: randomUUID(),
      zipCode: input.zipCode,
      name: input.name ?? null,
      isActive: input.isActive ?? true,
      createdAt: new Date(),
    };
    this.zipAreas.set(area.id, area);
    return { ...area };
  }

  async getZipAreasByIds(ids: string[]): Promise<ZipArea[]> {
    return ids
      .map((id) => this.zipAreas.get(id))
      .filter((area): area is ZipArea => Boolean(area))
      .map((area) => ({ ...area }));
  }

  async createDeliveryAgent(input: InsertDeliveryAgent & { agentCode: string }): Promise<DeliveryAgent | undefined> {
    const taken = Array.from(this.agents.values()).some(
      (agent) => agent.agentCode === input.agentCode || agent.userId === input.userId,
    );
    if (taken) return undefined;

    const now = new Date();
    const agent: DeliveryAgent = {
      id: randomUUID(),
      agentCode: input.agentCode,
      userId: input.userId,
      storeId: input.storeId,
      phoneNumber: input.phoneNumber,
      alternativePhone: input.alternativePhone ?? null,
      status: "offline",
      isAvailable: false,
      maxConcurrentOrders: input.maxConcurrentOrders ?? 3,
      serviceAreaRadius: input.serviceAreaRadius ?? 10,
      vehicleType: input.vehicleType ?? "scooter",
      vehicleNumber: input.vehicleNumber ?? null,
      currentLatitude: null,
      currentLongitude: null,
      lastLocationUpdate: null,
      totalDeliveries: 0,
      successfulDeliveries: 0,
      failedDeliveries: 0,
      totalEarnings: "0.00",
      averageRating: "0.00",
      createdAt: now,
      updatedAt: now,
    };
    this.agents.set(agent.id, agent);
    return { ...agent };
  }

  async getDeliveryAgent(id: string): Promise<DeliveryAgent | undefined> {
    const agent = this.agents.get(id);
    return agent ? { ...agent } : undefined;
  }

  async getDeliveryAgentByUserId(userId: string): Promise<DeliveryAgent | undefined> {
    const agent = Array.from(this.agents.values()).find((entry) => entry.userId === userId);
    return agent ? { ...agent } : undefined;
  }

  async getAvailableAgents(): Promise<DeliveryAgent[]> {
    return Array.from(this.agents.values())
      .filter((agent) => agent.isAvailable && agent.status === "active")
      .map((agent) => ({ ...agent }));
  }

  async updateAgentLocked(
    id: string,
    mutate: (snapshot: AgentSnapshot) => AgentPatch,
  ): Promise<DeliveryAgent | undefined> {
    const agent = this.agents.get(id);
    if (!agent) return undefined;
    const activeCoverages = Array.from(this.coverages.values())
      .filter((coverage) => coverage.agentId === id && coverage.isActive)
      .map((coverage) => ({ ...coverage }));
    const patch = mutate({ agent: { ...agent }, activeCoverages });
    const updated: DeliveryAgent = { ...agent, ...patch, updatedAt: new Date() };
    this.agents.set(id, updated);
    return { ...updated };
  }

  async updateAgentFromHistory(
    id: string,
    compute: (history: AgentHistory) => AgentPatch,
  ): Promise<DeliveryAgent | undefined> {
    const agent = this.agents.get(id);
    if (!agent) return undefined;
    const history = Array.from(this.deliveries.values()).filter((delivery) => delivery.agentId === id);
    const historyIds = new Set(history.map((delivery) => delivery.id));
    const ratings = Array.from(this.ratings.values())
      .filter((rating) => historyIds.has(rating.deliveryId))
      .map((rating) => rating.rating);
    const patch = compute({
      agent: { ...agent },
      deliveries: history.map(({ status, agentPayout }) => ({ status, agentPayout })),
      ratings,
    });
    const updated: DeliveryAgent = { ...agent, ...patch, updatedAt: new Date() };
    this.agents.set(id, updated);
    return { ...updated };
  }

  async recordAgentLocation(id: string, update: LocationUpdate): Promise<LocationUpdateResult | undefined> {
    const agent = this.agents.get(id);
    if (!agent) return undefined;
    const updated: DeliveryAgent = {
      ...agent,
      currentLatitude: update.latitude.toString(),
      currentLongitude: update.longitude.toString(),
      lastLocationUpdate: update.recordedAt,
      updatedAt: new Date(),
    };
    this.agents.set(id, updated);

    let trackingPoint: DeliveryTrackingPoint | null = null;
    if (update.deliveryCode) {
      const delivery = Array.from(this.deliveries.values()).find(
        (entry) => entry.deliveryCode === update.deliveryCode && entry.agentId === id,
      );
      if (delivery) {
        trackingPoint = this.pushTrackingPoint(delivery.id, update, update.recordedAt);
      }
    }
    return { agent: { ...updated }, trackingPoint };
  }

  async getAgentZipCoverages(agentId: string): Promise<AgentZipCoverage[]> {
    return Array.from(this.coverages.values())
      .filter((coverage) => coverage.agentId === agentId)
      .map((coverage) => ({ ...coverage }));
  }

  async applyCoverageChanges(agentId: string, changes: CoverageChanges): Promise<AgentZipCoverage[]> {
    const now = new Date();
    for (const id of changes.deactivate) {
      const coverage = this.coverages.get(id);
      if (coverage && coverage.agentId === agentId) {
        this.coverages.set(id, { ...coverage, isActive: false, updatedAt: now });
      }
    }
    for (const id of changes.reactivate) {
      const coverage = this.coverages.get(id);
      if (coverage && coverage.agentId === agentId) {
        this.coverages.set(id, { ...coverage, isActive: true, updatedAt: now });
      }
    }
    for (const zipAreaId of changes.create) {
      const exists = Array.from(this.coverages.values()).some(
        (coverage) => coverage.agentId === agentId && coverage.zipAreaId === zipAreaId,
      );
      if (exists) continue;
      const coverage: AgentZipCoverage = {
        id: randomUUID(),
        agentId,
        zipAreaId,
        isActive: true,
        deliveryFeeOverride: null,
        createdAt: now,
        updatedAt: now,
      };
      this.coverages.set(coverage.id, coverage);
    }
    return this.getAgentZipCoverages(agentId);
  }

  async setCoverageFeeOverride(
    agentId: string,
    zipAreaId: string,
    override: string | null,
  ): Promise<AgentZipCoverage | undefined> {
    const coverage = Array.from(this.coverages.values()).find(
      (entry) => entry.agentId === agentId && entry.zipAreaId === zipAreaId,
    );
    if (!coverage) return undefined;
    const updated: AgentZipCoverage = { ...coverage, deliveryFeeOverride: override, updatedAt: new Date() };
    this.coverages.set(coverage.id, updated);
    return { ...updated };
  }

  async createDelivery(input: NewDelivery, initialPoint: GeoPoint): Promise<Delivery | undefined> {
    const taken = Array.from(this.deliveries.values()).some(
      (delivery) => delivery.orderId === input.orderId || delivery.deliveryCode === input.deliveryCode,
    );
    if (taken) return undefined;

    const now = new Date();
    const delivery: Delivery = {
      id: randomUUID(),
      ...input,
      acceptedAt: null,
      arrivedAtStoreAt: null,
      pickedUpAt: null,
      deliveredAt: null,
      storePickupVerified: false,
      customerDeliveryVerified: false,
      createdAt: now,
      updatedAt: now,
    };
    this.deliveries.set(delivery.id, delivery);
    this.pushTrackingPoint(delivery.id, initialPoint, now);
    return { ...delivery };
  }

  async getDelivery(id: string): Promise<Delivery | undefined> {
    const delivery = this.deliveries.get(id);
    return delivery ? { ...delivery } : undefined;
  }

  async getDeliveryByCode(deliveryCode: string): Promise<Delivery | undefined> {
    const delivery = Array.from(this.deliveries.values()).find((entry) => entry.deliveryCode === deliveryCode);
    return delivery ? { ...delivery } : undefined;
  }

  async getDeliveryByOrderId(orderId: string): Promise<Delivery | undefined> {
    const delivery = Array.from(this.deliveries.values()).find((entry) => entry.orderId === orderId);
    return delivery ? { ...delivery } : undefined;
  }

  async getAgentDeliveries(agentId: string, statuses?: readonly DeliveryStatus[]): Promise<Delivery[]> {
    return Array.from(this.deliveries.values())
      .filter((delivery) => delivery.agentId === agentId)
      .filter((delivery) => !statuses || statuses.includes(delivery.status))
      .sort(byNewestAssignment)
      .map((delivery) => ({ ...delivery }));
  }

  async applyDeliveryTransition(
    id: string,
    expectedStatus: DeliveryStatus,
    patch: DeliveryStatusPatch,
    options: TransitionOptions = {},
  ): Promise<Delivery | undefined> {
    const current = this.deliveries.get(id);
    if (!current || current.status !== expectedStatus) return undefined;

    const now = new Date();
    const updated: Delivery = { ...current, ...patch, updatedAt: now };
    this.deliveries.set(id, updated);

    const agent = this.agents.get(updated.agentId);
    if (agent && options.incrementAgentCounters) {
      this.agents.set(agent.id, {
        ...agent,
        totalDeliveries: agent.totalDeliveries + 1,
        successfulDeliveries: agent.successfulDeliveries + 1,
        updatedAt: now,
      });
    }
    if (options.issue) {
      this.pushIssue(id, options.issue);
    }
    if (agent && options.trackAgentLocation && hasLocation(agent)) {
      this.pushTrackingPoint(
        id,
        { latitude: Number(agent.currentLatitude), longitude: Number(agent.currentLongitude) },
        now,
      );
    }
    return { ...updated };
  }

  async getTrackingPoints(deliveryId: string): Promise<DeliveryTrackingPoint[]> {
    return this.tracking
      .filter((point) => point.deliveryId === deliveryId)
      .sort((a, b) => b.recordedAt.getTime() - a.recordedAt.getTime() || b.sequence - a.sequence)
      .map((point) => ({ ...point }));
  }

  async createDeliveryIssue(deliveryId: string, input: InsertDeliveryIssue): Promise<DeliveryIssue> {
    return { ...this.pushIssue(deliveryId, input) };
  }

  async getDeliveryIssues(deliveryId: string): Promise<DeliveryIssue[]> {
    return this.issues.filter((issue) => issue.deliveryId === deliveryId).map((issue) => ({ ...issue }));
  }

  async createDeliveryRating(deliveryId: string, input: InsertDeliveryRating): Promise<DeliveryRating | undefined> {
    if (this.ratings.has(deliveryId)) return undefined;
    const rating: DeliveryRating = {
      id: randomUUID(),
      deliveryId,
      rating: input.rating,
      feedback: input.feedback ?? null,
      createdAt: new Date(),
    };
    this.ratings.set(deliveryId, rating);
    return { ...rating };
  }

  async getDeliveryRating(deliveryId: string): Promise<DeliveryRating | undefined> {
    const rating = this.ratings.get(deliveryId);
    return rating ? { ...rating } : undefined;
  }

  async getOrCreateDeliverySettings(): Promise<DeliverySettings> {
    if (!this.settings) {
      this.settings = {
        id: randomUUID(),
        singletonKey: SETTINGS_KEY,
        calculationMethod: DEFAULT_DELIVERY_SETTINGS.calculationMethod,
        baseDeliveryFee: DEFAULT_DELIVERY_SETTINGS.baseDeliveryFee.toFixed(2),
        feePerKm: DEFAULT_DELIVERY_SETTINGS.feePerKm.toFixed(2),
        minimumDeliveryFee: DEFAULT_DELIVERY_SETTINGS.minimumDeliveryFee.toFixed(2),
        maximumDeliveryFee: DEFAULT_DELIVERY_SETTINGS.maximumDeliveryFee.toFixed(2),
        freeDeliveryThreshold: DEFAULT_DELIVERY_SETTINGS.freeDeliveryThreshold.toFixed(2),
        agentPayoutPercentage: DEFAULT_DELIVERY_SETTINGS.agentPayoutPercentage.toFixed(2),
        updatedAt: new Date(),
      };
    }
    return toDeliverySettings(this.settings);
  }

  async updateDeliverySettings(patch: UpdateDeliverySettings): Promise<DeliverySettings> {
    await this.getOrCreateDeliverySettings();
    if (this.settings) {
      this.settings = { ...this.settings, ...patch, updatedAt: new Date() };
    }
    return this.getOrCreateDeliverySettings();
  }

  private pushTrackingPoint(deliveryId: string, point: GeoPoint, recordedAt: Date): DeliveryTrackingPoint {
    const entry: DeliveryTrackingPoint = {
      id: randomUUID(),
      deliveryId,
      latitude: point.latitude.toString(),
      longitude: point.longitude.toString(),
      recordedAt,
      sequence: ++this.trackingSequence,
    };
    this.tracking.push(entry);
    return { ...entry };
  }

  private pushIssue(deliveryId: string, input: InsertDeliveryIssue): DeliveryIssue {
    const issue: DeliveryIssue = {
      id: randomUUID(),
      deliveryId,
      issueType: input.issueType,
      description: input.description,
      resolved: false,
      resolution: null,
      createdAt: new Date(),
    };
    this.issues.push(issue);
    return issue;
  }
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: NodePgDatabase) {}

  async createZipArea(input: InsertZipArea): Promise<ZipArea> {
    const [area] = await this.db
      .insert(zipAreas)
      .values(input)
      .onConflictDoNothing({ target: zipAreas.zipCode })
      .returning();
    if (!area) {
      throw new ZipAreaExistsError(input.zipCode);
    }
    return area;
  }

  async getZipAreasByIds(ids: string[]): Promise<ZipArea[]> {
    if (ids.length === 0) return [];
    return await this.db.select().from(zipAreas).where(inArray(zipAreas.id, ids));
  }

  async createDeliveryAgent(input: InsertDeliveryAgent & { agentCode: string }): Promise<DeliveryAgent | undefined> {
    const [agent] = await this.db
      .insert(deliveryAgents)
      .values(input)
      .onConflictDoNothing()
      .returning();
    return agent || undefined;
  }

  async getDeliveryAgent(id: string): Promise<DeliveryAgent | undefined> {
    const [agent] = await this.db.select().from(deliveryAgents).where(eq(deliveryAgents.id, id));
    return agent || undefined;
  }

  async getDeliveryAgentByUserId(userId: string): Promise<DeliveryAgent | undefined> {
    const [agent] = await this.db.select().from(deliveryAgents).where(eq(deliveryAgents.userId, userId));
    return agent || undefined;
  }

  async getAvailableAgents(): Promise<DeliveryAgent[]> {
    return await this.db
      .select()
      .from(deliveryAgents)
      .where(and(eq(deliveryAgents.isAvailable, true), eq(deliveryAgents.status, "active")));
  }

  async updateAgentLocked(
    id: string,
    mutate: (snapshot: AgentSnapshot) => AgentPatch,
  ): Promise<DeliveryAgent | undefined> {
    return await this.db.transaction(async (tx) => {
      const [agent] = await tx.select().from(deliveryAgents).where(eq(deliveryAgents.id, id)).for("update");
      if (!agent) return undefined;
      const activeCoverages = await tx
        .select()
        .from(agentZipCoverages)
        .where(and(eq(agentZipCoverages.agentId, id), eq(agentZipCoverages.isActive, true)));
      const patch = mutate({ agent, activeCoverages });
      const [updated] = await tx
        .update(deliveryAgents)
        .set({ ...patch, updatedAt: new Date() })
        .where(eq(deliveryAgents.id, id))
        .returning();
      return updated;
    });
  }

  async updateAgentFromHistory(
    id: string,
    compute: (history: AgentHistory) => AgentPatch,
  ): Promise<DeliveryAgent | undefined> {
    return await this.db.transaction(async (tx) => {
      const [agent] = await tx.select().from(deliveryAgents).where(eq(deliveryAgents.id, id)).for("update");
      if (!agent) return undefined;
      const history = await tx
        .select({ status: deliveries.status, agentPayout: deliveries.agentPayout })
        .from(deliveries)
        .where(eq(deliveries.agentId, id));
      const ratingRows = await tx
        .select({ rating: deliveryRatings.rating })
        .from(deliveryRatings)
        .innerJoin(deliveries, eq(deliveryRatings.deliveryId, deliveries.id))
        .where(eq(deliveries.agentId, id));
      const patch = compute({ agent, deliveries: history, ratings: ratingRows.map((row) => row.rating) });
      const [updated] = await tx
        .update(deliveryAgents)
        .set({ ...patch, updatedAt: new Date() })
        .where(eq(deliveryAgents.id, id))
        .returning();
      return updated;
    });
  }

  async recordAgentLocation(id: string, update: LocationUpdate): Promise<LocationUpdateResult | undefined> {
    return await this.db.transaction(async (tx) => {
      const [agent] = await tx
        .update(deliveryAgents)
        .set({
          currentLatitude: update.latitude.toString(),
          currentLongitude: update.longitude.toString(),
          lastLocationUpdate: update.recordedAt,
          updatedAt: new Date(),
        })
        .where(eq(deliveryAgents.id, id))
        .returning();
      if (!agent) return undefined;

      let trackingPoint: DeliveryTrackingPoint | null = null;
      if (update.deliveryCode) {
        const [delivery] = await tx
          .select({ id: deliveries.id })
          .from(deliveries)
          .where(and(eq(deliveries.deliveryCode, update.deliveryCode), eq(deliveries.agentId, id)));
        if (delivery) {
          const [point] = await tx
            .insert(deliveryTracking)
            .values({
              deliveryId: delivery.id,
              latitude: update.latitude.toString(),
              longitude: update.longitude.toString(),
              recordedAt: update.recordedAt,
            })
            .returning();
          trackingPoint = point ?? null;
        }
      }
      return { agent, trackingPoint };
    });
  }

  async getAgentZipCoverages(agentId: string): Promise<AgentZipCoverage[]> {
    return await this.db.select().from(agentZipCoverages).where(eq(agentZipCoverages.agentId, agentId));
  }

  async applyCoverageChanges(agentId: string, changes: CoverageChanges): Promise<AgentZipCoverage[]> {
    await this.db.transaction(async (tx) => {
      const now = new Date();
      if (changes.deactivate.length) {
        await tx
          .update(agentZipCoverages)
          .set({ isActive: false, updatedAt: now })
          .where(and(eq(agentZipCoverages.agentId, agentId), inArray(agentZipCoverages.id, changes.deactivate)));
      }
      if (changes.reactivate.length) {
        await tx
          .update(agentZipCoverages)
          .set({ isActive: true, updatedAt: now })
          .where(and(eq(agentZipCoverages.agentId, agentId), inArray(agentZipCoverages.id, changes.reactivate)));
      }
      if (changes.create.length) {
        await tx
          .insert(agentZipCoverages)
          .values(changes.create.map((zipAreaId) => ({ agentId, zipAreaId, isActive: true })))
          .onConflictDoNothing({ target: [agentZipCoverages.agentId, agentZipCoverages.zipAreaId] });
      }
    });
    return this.getAgentZipCoverages(agentId);
  }

  async setCoverageFeeOverride(
    agentId: string,
    zipAreaId: string,
    override: string | null,
  ): Promise<AgentZipCoverage | undefined> {
    const [coverage] = await this.db
      .update(agentZipCoverages)
      .set({ deliveryFeeOverride: override, updatedAt: new Date() })
      .where(and(eq(agentZipCoverages.agentId, agentId), eq(agentZipCoverages.zipAreaId, zipAreaId)))
      .returning();
    return coverage || undefined;
  }

  async createDelivery(input: NewDelivery, initialPoint: GeoPoint): Promise<Delivery | undefined> {
    return await this.db.transaction(async (tx) => {
      const [delivery] = await tx.insert(deliveries).values(input).onConflictDoNothing().returning();
      if (!delivery) return undefined;
      await tx.insert(deliveryTracking).values({
        deliveryId: delivery.id,
        latitude: initialPoint.latitude.toString(),
        longitude: initialPoint.longitude.toString(),
      });
      return delivery;
    });
  }

  async getDelivery(id: string): Promise<Delivery | undefined> {
    const [delivery] = await this.db.select().from(deliveries).where(eq(deliveries.id, id));
    return delivery || undefined;
  }

  async getDeliveryByCode(deliveryCode: string): Promise<Delivery | undefined> {
    const [delivery] = await this.db.select().from(deliveries).where(eq(deliveries.deliveryCode, deliveryCode));
    return delivery || undefined;
  }

  async getDeliveryByOrderId(orderId: string): Promise<Delivery | undefined> {
    const [delivery] = await this.db.select().from(deliveries).where(eq(deliveries.orderId, orderId));
    return delivery || undefined;
  }

  async getAgentDeliveries(agentId: string, statuses?: readonly DeliveryStatus[]): Promise<Delivery[]> {
    if (statuses && statuses.length === 0) return [];
    const conditions = [eq(deliveries.agentId, agentId)];
    if (statuses) {
      conditions.push(inArray(deliveries.status, [...statuses]));
    }
    return await this.db
      .select()
      .from(deliveries)
      .where(and(...conditions))
      .orderBy(desc(deliveries.assignedAt));
  }

  async applyDeliveryTransition(
    id: string,
    expectedStatus: DeliveryStatus,
    patch: DeliveryStatusPatch,
    options: TransitionOptions = {},
  ): Promise<Delivery | undefined> {
    return await this.db.transaction(async (tx) => {
      const [updated] = await tx
        .update(deliveries)
        .set({ ...patch, updatedAt: new Date() })
        .where(and(eq(deliveries.id, id), eq(deliveries.status, expectedStatus)))
        .returning();
      if (!updated) return undefined;

      if (options.incrementAgentCounters) {
        await tx
          .update(deliveryAgents)
          .set({
            totalDeliveries: sql`${deliveryAgents.totalDeliveries} + 1`,
            successfulDeliveries: sql`${deliveryAgents.successfulDeliveries} + 1`,
            updatedAt: new Date(),
          })
          .where(eq(deliveryAgents.id, updated.agentId));
      }
      if (options.issue) {
        await tx.insert(deliveryIssues).values({ ...options.issue, deliveryId: updated.id });
      }
      if (options.trackAgentLocation) {
        const [agent] = await tx
          .select({
            currentLatitude: deliveryAgents.currentLatitude,
            currentLongitude: deliveryAgents.currentLongitude,
          })
          .from(deliveryAgents)
          .where(eq(deliveryAgents.id, updated.agentId));
        if (agent && agent.currentLatitude != null && agent.currentLongitude != null) {
          await tx.insert(deliveryTracking).values({
            deliveryId: updated.id,
            latitude: agent.currentLatitude,
            longitude: agent.currentLongitude,
          });
        }
      }
      return updated;
    });
  }

  async getTrackingPoints(deliveryId: string): Promise<DeliveryTrackingPoint[]> {
    return await this.db
      .select()
      .from(deliveryTracking)
      .where(eq(deliveryTracking.deliveryId, deliveryId))
      .orderBy(desc(deliveryTracking.recordedAt), desc(deliveryTracking.sequence));
  }

  async createDeliveryIssue(deliveryId: string, input: InsertDeliveryIssue): Promise<DeliveryIssue> {
    const [issue] = await this.db
      .insert(deliveryIssues)
      .values({ ...input, deliveryId })
      .returning();
    return issue;
  }

  async getDeliveryIssues(deliveryId: string): Promise<DeliveryIssue[]> {
    return await this.db
      .select()
      .from(deliveryIssues)
      .where(eq(deliveryIssues.deliveryId, deliveryId))
      .orderBy(desc(deliveryIssues.createdAt));
  }

  async createDeliveryRating(deliveryId: string, input: InsertDeliveryRating): Promise<DeliveryRating | undefined> {
    const [rating] = await this.db
      .insert(deliveryRatings)
      .values({ ...input, deliveryId })
      .onConflictDoNothing({ target: deliveryRatings.deliveryId })
      .returning();
    return rating || undefined;
  }

  async getDeliveryRating(deliveryId: string): Promise<DeliveryRating | undefined> {
    const [rating] = await this.db.select().from(deliveryRatings).where(eq(deliveryRatings.deliveryId, deliveryId));
    return rating || undefined;
  }

  async getOrCreateDeliverySettings(): Promise<DeliverySettings> {
    // Two first callers race on the unique singleton key; the loser's insert is a no-op
    await this.db
      .insert(deliverySettings)
      .values({ singletonKey: SETTINGS_KEY })
      .onConflictDoNothing({ target: deliverySettings.singletonKey });
    const [row] = await this.db
      .select()
      .from(deliverySettings)
      .where(eq(deliverySettings.singletonKey, SETTINGS_KEY));
    if (!row) {
      throw new Error("Delivery settings row missing after get-or-create");
    }
    return toDeliverySettings(row);
  }

  async updateDeliverySettings(patch: UpdateDeliverySettings): Promise<DeliverySettings> {
    await this.getOrCreateDeliverySettings();
    const [row] = await this.db
      .update(deliverySettings)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(deliverySettings.singletonKey, SETTINGS_KEY))
      .returning();
    return toDeliverySettings(row);
  }
}
