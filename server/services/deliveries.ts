import { randomInt } from "node:crypto";
import type { Logger } from "pino";

import type {
  Delivery,
  DeliveryIssue,
  DeliveryRating,
  DeliveryStatus,
  InsertDeliveryIssue,
  InsertDeliveryRating,
  UpdateDeliverySettings,
} from "@shared/schema";
import type { DomainEvent } from "@shared/events";
import type { IStorage, TransitionOptions } from "../storage";
import { parseCoordinate } from "../utils/geolocation";
import {
  AgentStatsService,
  buildDashboard,
  buildEarningsReport,
  type AgentDashboard,
  type EarningsRange,
  type EarningsReport,
} from "./agent-stats";
import {
  ACTIVE_DELIVERY_STATUSES,
  buildStatusSteps,
  generateDeliveryId,
  generateOtp,
  isTerminalStatus,
  planTransition,
  type DeliveryAction,
  type DeliveryStatusStep,
  type TransitionResult,
} from "./delivery-state";
import {
  AgentNotFoundError,
  DeliveryNotFoundError,
  DuplicateDeliveryError,
  RatingNotAllowedError,
} from "./errors";
import { createDomainEvent, type EventPublisher } from "./event-bus";
import {
  DEFAULT_DELIVERY_SETTINGS,
  calculateAgentPayout,
  deliverySettingsSchema,
  priceDelivery,
  roundMoney,
  type DeliveryPricing,
  type DeliverySettings,
} from "./fee-calculator";

const DELIVERY_CODE_ATTEMPTS = 5;

// Agents may hand a delivery back only before they hold the goods
export const AGENT_CANCELLABLE_STATUSES: readonly DeliveryStatus[] = ["assigned", "accepted", "at_store"];

export const deliveryListFilters = ["active", "pending", "in_progress", "completed", "problematic", "all"] as const;

export type DeliveryListFilter = (typeof deliveryListFilters)[number];

export const DELIVERY_LIST_FILTERS: Record<DeliveryListFilter, readonly DeliveryStatus[] | undefined> = {
  active: ACTIVE_DELIVERY_STATUSES,
  pending: ["assigned"],
  in_progress: ["accepted", "at_store", "picked_up", "in_transit"],
  completed: ["delivered"],
  problematic: ["cancelled", "failed"],
  all: undefined,
};

function matchesFilter(delivery: Delivery, filter: DeliveryListFilter): boolean {
  const statuses = DELIVERY_LIST_FILTERS[filter];
  return !statuses || statuses.includes(delivery.status);
}

// What agents and customers see; OTPs reach the store and customer out of band
export type DeliveryView = Omit<Delivery, "storePickupOtp" | "customerDeliveryOtp">;

export function toDeliveryView(delivery: Delivery): DeliveryView {
  const { storePickupOtp: _storeOtp, customerDeliveryOtp: _customerOtp, ...view } = delivery;
  return view;
}

export type CreateDeliveryInput = {
  orderId: string;
  agentId: string;
  orderValue?: number | null;
  distanceKm?: number | null;
  zipAreaId?: string | null;
  // A non-zero fee skips pricing
  deliveryFee?: number;
  agentPayout?: number;
};

export type ActorScope = {
  // Set for agent-facing calls; deliveries of other agents then read as not found
  agentId?: string;
  actorType: "agent" | "admin" | "system";
};

export type DeliveryListOptions = {
  filter?: DeliveryListFilter;
  from?: string;
  to?: string;
};

export type DeliveryList = {
  deliveries: DeliveryView[];
  counts: Record<DeliveryListFilter, number>;
};

export type AgentDeliveryDetail = {
  delivery: DeliveryView;
  issues: DeliveryIssue[];
  trackingPoints: Array<{ latitude: number; longitude: number; recordedAt: string }>;
};

export type AgentDashboardView = AgentDashboard & { activeDeliveries: DeliveryView[] };

export type DeliveryTracking = {
  deliveryCode: string;
  orderId: string;
  status: DeliveryStatus;
  assignedAt: string;
  deliveredAt: string | null;
  steps: DeliveryStatusStep[];
  latestLocation: { latitude: number; longitude: number; recordedAt: string } | null;
  rating: Pick<DeliveryRating, "rating" | "feedback"> | null;
  canRate: boolean;
};

function utcDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

interface DeliveryServiceDeps {
  storage: IStorage;
  logger: Logger;
  events: EventPublisher;
  stats: AgentStatsService;
  settings?: DeliverySettings;
  now?: () => Date;
  random?: (max: number) => number;
}

export class DeliveryService {
  private readonly storage: IStorage;
  private readonly logger: Logger;
  private readonly events: EventPublisher;
  private readonly stats: AgentStatsService;
  private readonly now: () => Date;
  private readonly random: (max: number) => number;
  private settings: DeliverySettings | undefined;

  constructor({ storage, logger, events, stats, settings, now, random }: DeliveryServiceDeps) {
    this.storage = storage;
    this.logger = logger;
    this.events = events;
    this.stats = stats;
    this.settings = settings;
    this.now = now ?? (() => new Date());
    this.random = random ?? ((max) => randomInt(max));
  }

  getSettings(): DeliverySettings | undefined {
    return this.settings ? { ...this.settings } : undefined;
  }

  async reloadSettings(): Promise<DeliverySettings> {
    this.settings = await this.storage.getOrCreateDeliverySettings();
    return { ...this.settings };
  }

  /** Rejects (ZodError) a patch that would leave the settings unusable, e.g. minimum above maximum. */
  async updateSettings(patch: UpdateDeliverySettings): Promise<DeliverySettings> {
    const current = this.settings ?? (await this.storage.getOrCreateDeliverySettings());
    const amount = (value: string | undefined, fallback: number) => (value === undefined ? fallback : Number(value));
    deliverySettingsSchema.parse({
      calculationMethod: patch.calculationMethod ?? current.calculationMethod,
      baseDeliveryFee: amount(patch.baseDeliveryFee, current.baseDeliveryFee),
      feePerKm: amount(patch.feePerKm, current.feePerKm),
      minimumDeliveryFee: amount(patch.minimumDeliveryFee, current.minimumDeliveryFee),
      maximumDeliveryFee: amount(patch.maximumDeliveryFee, current.maximumDeliveryFee),
      freeDeliveryThreshold: amount(patch.freeDeliveryThreshold, current.freeDeliveryThreshold),
      agentPayoutPercentage: amount(patch.agentPayoutPercentage, current.agentPayoutPercentage),
    });

    const updated = await this.storage.updateDeliverySettings(patch);
    this.settings = updated;
    this.logger.info({ settings: updated }, "delivery settings updated");
    return { ...updated };
  }

  async createDelivery(input: CreateDeliveryInput): Promise<Delivery> {
    if (await this.storage.getDeliveryByOrderId(input.orderId)) {
      throw new DuplicateDeliveryError(input.orderId);
    }
    const agent = await this.storage.getDeliveryAgent(input.agentId);
    if (!agent) {
      throw new AgentNotFoundError(input.agentId);
    }

    const pricing = await this.resolvePricing(input);
    const latitude = parseCoordinate(agent.currentLatitude);
    const longitude = parseCoordinate(agent.currentLongitude);
    const initialPoint =
      latitude !== null && longitude !== null ? { latitude, longitude } : { latitude: 0, longitude: 0 };

    for (let attempt = 1; attempt <= DELIVERY_CODE_ATTEMPTS; attempt++) {
      const assignedAt = this.now();
      const delivery = await this.storage.createDelivery(
        {
          orderId: input.orderId,
          agentId: agent.id,
          deliveryCode: generateDeliveryId(assignedAt, this.random),
          status: "assigned",
          deliveryFee: pricing.deliveryFee.toFixed(2),
          agentPayout: pricing.agentPayout.toFixed(2),
          assignedAt,
          storePickupOtp: generateOtp(this.random),
          customerDeliveryOtp: generateOtp(this.random),
        },
        initialPoint,
      );
      if (delivery) {
        this.logger.info(
          {
            deliveryId: delivery.id,
            deliveryCode: delivery.deliveryCode,
            orderId: delivery.orderId,
            agentId: agent.id,
            deliveryFee: delivery.deliveryFee,
            fallbackPricing: pricing.fallback,
          },
          "delivery created",
        );
        await this.emit(
          createDomainEvent({
            source: "service.deliveries",
            category: "delivery.lifecycle",
            name: "created",
            payload: {
              deliveryId: delivery.deliveryCode,
              orderId: delivery.orderId,
              agentId: delivery.agentId,
              status: delivery.status,
              deliveryFee: pricing.deliveryFee,
              agentPayout: pricing.agentPayout,
            },
            actor: { actorType: "system" },
          }),
        );
        return delivery;
      }
      if (await this.storage.getDeliveryByOrderId(input.orderId)) {
        throw new DuplicateDeliveryError(input.orderId);
      }
      this.logger.warn({ orderId: input.orderId, attempt }, "delivery code collision, retrying");
    }
    throw new Error(`Could not generate a unique delivery code after ${DELIVERY_CODE_ATTEMPTS} attempts`);
  }

  accept(deliveryCode: string, scope: ActorScope): Promise<TransitionResult> {
    return this.transition(deliveryCode, { type: "accept" }, scope);
  }

  arriveAtStore(deliveryCode: string, scope: ActorScope): Promise<TransitionResult> {
    return this.transition(deliveryCode, { type: "arrive_at_store" }, scope);
  }

  pickup(deliveryCode: string, otp: string, scope: ActorScope): Promise<TransitionResult> {
    return this.transition(deliveryCode, { type: "pickup", otp }, scope);
  }

  markInTransit(deliveryCode: string, scope: ActorScope): Promise<TransitionResult> {
    return this.transition(deliveryCode, { type: "mark_in_transit" }, scope);
  }

  complete(deliveryCode: string, otp: string, scope: ActorScope): Promise<TransitionResult> {
    return this.transition(deliveryCode, { type: "complete", otp }, scope, { incrementAgentCounters: true });
  }

  cancel(deliveryCode: string, scope: ActorScope, reason?: string | null): Promise<TransitionResult> {
    const by = scope.actorType === "agent" ? "agent" : "dispatcher";
    const options: TransitionOptions = reason
      ? { issue: { issueType: "other", description: `Delivery cancelled by ${by}. Reason: ${reason}` } }
      : {};
    return this.transition(deliveryCode, { type: "cancel" }, scope, options);
  }

  fail(deliveryCode: string, scope: ActorScope, reason: string): Promise<TransitionResult> {
    return this.transition(deliveryCode, { type: "fail" }, scope, {
      issue: { issueType: "other", description: `Delivery failed. Reason: ${reason}` },
    });
  }

  async reportIssue(deliveryCode: string, scope: ActorScope, input: InsertDeliveryIssue): Promise<DeliveryIssue> {
    const delivery = await this.findInScope(deliveryCode, scope);
    if (!delivery) {
      throw new DeliveryNotFoundError(deliveryCode);
    }
    const issue = await this.storage.createDeliveryIssue(delivery.id, input);
    this.logger.info({ deliveryCode, issueType: issue.issueType }, "delivery issue reported");
    return issue;
  }

  async getAgentDelivery(deliveryCode: string, agentId: string): Promise<AgentDeliveryDetail> {
    const delivery = await this.findInScope(deliveryCode, { agentId, actorType: "agent" });
    if (!delivery) {
      throw new DeliveryNotFoundError(deliveryCode);
    }
    const [issues, points] = await Promise.all([
      this.storage.getDeliveryIssues(delivery.id),
      this.storage.getTrackingPoints(delivery.id),
    ]);
    return {
      delivery: toDeliveryView(delivery),
      issues,
      trackingPoints: points.map((point) => ({
        latitude: Number(point.latitude),
        longitude: Number(point.longitude),
        recordedAt: point.recordedAt.toISOString(),
      })),
    };
  }

  async listAgentDeliveries(agentId: string, options: DeliveryListOptions = {}): Promise<DeliveryList> {
    const all = await this.storage.getAgentDeliveries(agentId);
    const filter = options.filter ?? "all";
    const matches = all.filter((delivery) => {
      if (!matchesFilter(delivery, filter)) return false;
      const created = utcDate(delivery.createdAt);
      if (options.from && created < options.from) return false;
      if (options.to && created > options.to) return false;
      return true;
    });

    const count = (name: DeliveryListFilter) => all.filter((delivery) => matchesFilter(delivery, name)).length;
    const counts: Record<DeliveryListFilter, number> = {
      active: count("active"),
      pending: count("pending"),
      in_progress: count("in_progress"),
      completed: count("completed"),
      problematic: count("problematic"),
      all: all.length,
    };
    return { deliveries: matches.map(toDeliveryView), counts };
  }

  async trackDelivery(deliveryCode: string): Promise<DeliveryTracking> {
    const delivery = await this.storage.getDeliveryByCode(deliveryCode);
    if (!delivery) {
      throw new DeliveryNotFoundError(deliveryCode);
    }
    const [points, rating] = await Promise.all([
      this.storage.getTrackingPoints(delivery.id),
      this.storage.getDeliveryRating(delivery.id),
    ]);
    const latest = points[0];
    return {
      deliveryCode: delivery.deliveryCode,
      orderId: delivery.orderId,
      status: delivery.status,
      assignedAt: delivery.assignedAt.toISOString(),
      deliveredAt: delivery.deliveredAt ? delivery.deliveredAt.toISOString() : null,
      steps: buildStatusSteps(delivery),
      latestLocation: latest
        ? {
            latitude: Number(latest.latitude),
            longitude: Number(latest.longitude),
            recordedAt: latest.recordedAt.toISOString(),
          }
        : null,
      rating: rating ? { rating: rating.rating, feedback: rating.feedback } : null,
      canRate: delivery.status === "delivered" && !rating,
    };
  }

  async submitRating(deliveryCode: string, input: InsertDeliveryRating): Promise<DeliveryRating> {
    const delivery = await this.storage.getDeliveryByCode(deliveryCode);
    if (!delivery) {
      throw new DeliveryNotFoundError(deliveryCode);
    }
    if (delivery.status !== "delivered") {
      throw new RatingNotAllowedError("Only delivered deliveries can be rated.");
    }
    const rating = await this.storage.createDeliveryRating(delivery.id, input);
    if (!rating) {
      throw new RatingNotAllowedError("This delivery has already been rated.");
    }

    await this.runStats(delivery.agentId, () => this.stats.recomputeAgentRating(delivery.agentId));
    this.logger.info({ deliveryCode, rating: rating.rating }, "delivery rated");
    await this.emit(
      createDomainEvent({
        source: "service.deliveries",
        category: "delivery.lifecycle",
        name: "rated",
        payload: {
          deliveryId: delivery.deliveryCode,
          orderId: delivery.orderId,
          agentId: delivery.agentId,
          status: delivery.status,
          rating: rating.rating,
        },
        actor: { actorType: "customer" },
      }),
    );
    return rating;
  }

  async getEarnings(agentId: string, range: Partial<EarningsRange> = {}): Promise<EarningsReport> {
    const today = this.now();
    const resolved: EarningsRange = {
      from: range.from ?? `${utcDate(today).slice(0, 8)}01`,
      to: range.to ?? utcDate(today),
    };
    const delivered = await this.storage.getAgentDeliveries(agentId, ["delivered"]);
    return buildEarningsReport(delivered, resolved);
  }

  async getDashboard(agentId: string): Promise<AgentDashboardView> {
    const agent = await this.storage.getDeliveryAgent(agentId);
    if (!agent) {
      throw new AgentNotFoundError(agentId);
    }
    const deliveries = await this.storage.getAgentDeliveries(agentId);
    return {
      ...buildDashboard(agent, deliveries, this.now()),
      activeDeliveries: deliveries.filter((delivery) => matchesFilter(delivery, "active")).map(toDeliveryView),
    };
  }

  private async resolvePricing(input: CreateDeliveryInput): Promise<DeliveryPricing> {
    if (input.deliveryFee && input.deliveryFee > 0) {
      return {
        deliveryFee: roundMoney(input.deliveryFee),
        agentPayout:
          input.agentPayout ?? calculateAgentPayout(this.settings ?? DEFAULT_DELIVERY_SETTINGS, input.deliveryFee),
        fallback: false,
      };
    }

    let feeOverride: number | null = null;
    if (input.zipAreaId) {
      const coverages = await this.storage.getAgentZipCoverages(input.agentId);
      const coverage = coverages.find(
        (entry) => entry.isActive && entry.zipAreaId === input.zipAreaId && entry.deliveryFeeOverride !== null,
      );
      if (coverage?.deliveryFeeOverride) {
        feeOverride = Number(coverage.deliveryFeeOverride);
      }
    }
    return priceDelivery(
      this.settings,
      { distanceKm: input.distanceKm, orderValue: input.orderValue, feeOverride },
      this.logger,
    );
  }

  private async findInScope(deliveryCode: string, scope: ActorScope): Promise<Delivery | undefined> {
    const delivery = await this.storage.getDeliveryByCode(deliveryCode);
    if (!delivery) return undefined;
    if (scope.agentId && delivery.agentId !== scope.agentId) return undefined;
    return delivery;
  }

  private async transition(
    deliveryCode: string,
    action: DeliveryAction,
    scope: ActorScope,
    options: TransitionOptions = {},
  ): Promise<TransitionResult> {
    const delivery = await this.findInScope(deliveryCode, scope);
    if (!delivery) {
      return { ok: false, reason: "not_found" };
    }
    if (
      action.type === "cancel" &&
      scope.actorType === "agent" &&
      !AGENT_CANCELLABLE_STATUSES.includes(delivery.status)
    ) {
      return { ok: false, reason: "invalid_state" };
    }

    const plan = planTransition(delivery, action, this.now());
    if (!plan.ok) {
      this.logger.info({ deliveryCode, action: action.type, status: delivery.status, reason: plan.reason }, "delivery transition rejected");
      return { ok: false, reason: plan.reason };
    }

    const updated = await this.storage.applyDeliveryTransition(delivery.id, plan.expectedStatus, plan.patch, {
      ...options,
      trackAgentLocation: true,
    });
    if (!updated) {
      this.logger.warn({ deliveryCode, action: action.type, expectedStatus: plan.expectedStatus }, "delivery changed concurrently");
      return { ok: false, reason: "stale_state" };
    }

    this.logger.info(
      { deliveryCode, agentId: updated.agentId, from: delivery.status, to: updated.status },
      "delivery status changed",
    );
    if (isTerminalStatus(updated.status)) {
      await this.runStats(updated.agentId, () => this.stats.recomputeAgentStats(updated.agentId));
    }
    await this.emit(
      createDomainEvent({
        source: "service.deliveries",
        category: "delivery.lifecycle",
        name: "status_changed",
        payload: {
          deliveryId: updated.deliveryCode,
          orderId: updated.orderId,
          agentId: updated.agentId,
          status: updated.status,
          previousStatus: delivery.status,
        },
        actor: { actorId: scope.agentId, actorType: scope.actorType },
      }),
    );
    return { ok: true, delivery: updated };
  }

  // The transition is already committed; a failed recompute is repaired by the next one
  private async runStats(agentId: string, recompute: () => Promise<unknown>): Promise<void> {
    try {
      await recompute();
    } catch (error) {
      this.logger.error({ err: error, agentId }, "failed to recompute agent stats");
    }
  }

  private async emit(event: DomainEvent): Promise<void> {
    try {
      await this.events.publish(event);
    } catch (error) {
      this.logger.error({ err: error, eventId: event.eventId, name: event.name }, "failed to publish delivery event");
    }
  }
}
