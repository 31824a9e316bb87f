import { randomInt } from "node:crypto";
import type { Logger } from "pino";

import type { AgentStatus, AgentZipCoverage, DeliveryAgent, InsertDeliveryAgent } from "@shared/schema";
import type { DomainEvent } from "@shared/events";
import type { CoverageChanges, IStorage, LocationUpdateResult } from "../storage";
import { ACTIVE_DELIVERY_STATUSES, generateAgentId } from "./delivery-state";
import {
  AgentAlreadyRegisteredError,
  AgentIdExhaustedError,
  AgentNotFoundError,
  CoverageNotFoundError,
  InvalidZipAreaError,
  MissingCoverageError,
} from "./errors";
import { createDomainEvent, type EventPublisher } from "./event-bus";
import { roundMoney } from "./fee-calculator";

const AGENT_CODE_ATTEMPTS = 5;

export type AgentProfile = DeliveryAgent & {
  currentOrdersCount: number;
  canAcceptOrders: boolean;
  successRate: number;
};

export type LocationInput = {
  latitude: number;
  longitude: number;
  deliveryCode?: string | null;
};

export function successRate(agent: Pick<DeliveryAgent, "totalDeliveries" | "successfulDeliveries">): number {
  if (agent.totalDeliveries <= 0) return 0;
  return roundMoney((agent.successfulDeliveries / agent.totalDeliveries) * 100);
}

export function canAcceptOrders(
  agent: Pick<DeliveryAgent, "isAvailable" | "status" | "maxConcurrentOrders">,
  currentOrdersCount: number,
): boolean {
  return agent.isAvailable && agent.status === "active" && currentOrdersCount < agent.maxConcurrentOrders;
}

/**
 * Diff between the agent's coverage rows and the selected ZIP areas. Rows are
 * never deleted: unselected ones are deactivated and selected inactive ones
 * come back.
 */
export function planCoverageUpdate(existing: readonly AgentZipCoverage[], selectedZipAreaIds: readonly string[]): CoverageChanges {
  const selected = new Set(selectedZipAreaIds);
  const known = new Set(existing.map((coverage) => coverage.zipAreaId));
  return {
    deactivate: existing
      .filter((coverage) => coverage.isActive && !selected.has(coverage.zipAreaId))
      .map((coverage) => coverage.id),
    reactivate: existing
      .filter((coverage) => !coverage.isActive && selected.has(coverage.zipAreaId))
      .map((coverage) => coverage.id),
    create: Array.from(selected).filter((zipAreaId) => !known.has(zipAreaId)),
  };
}

interface AgentServiceDeps {
  storage: IStorage;
  logger: Logger;
  events: EventPublisher;
  random?: (max: number) => number;
}

export class AgentService {
  private readonly storage: IStorage;
  private readonly logger: Logger;
  private readonly events: EventPublisher;
  private readonly random: (max: number) => number;

  constructor({ storage, logger, events, random }: AgentServiceDeps) {
    this.storage = storage;
    this.logger = logger;
    this.events = events;
    this.random = random ?? ((max) => randomInt(max));
  }

  async registerAgent(input: InsertDeliveryAgent): Promise<DeliveryAgent> {
    const existing = await this.storage.getDeliveryAgentByUserId(input.userId);
    if (existing) {
      throw new AgentAlreadyRegisteredError(input.userId);
    }
    for (let attempt = 1; attempt <= AGENT_CODE_ATTEMPTS; attempt++) {
      const agentCode = generateAgentId(this.random);
      const agent = await this.storage.createDeliveryAgent({ ...input, agentCode });
      if (agent) {
        this.logger.info({ agentId: agent.id, agentCode }, "delivery agent registered");
        return agent;
      }
      this.logger.warn({ agentCode, attempt }, "agent code collision, retrying");
    }
    throw new AgentIdExhaustedError(AGENT_CODE_ATTEMPTS);
  }

  async getAgent(agentId: string): Promise<DeliveryAgent> {
    const agent = await this.storage.getDeliveryAgent(agentId);
    if (!agent) {
      throw new AgentNotFoundError(agentId);
    }
    return agent;
  }

  async getProfile(agentId: string): Promise<AgentProfile> {
    const agent = await this.getAgent(agentId);
    const currentOrdersCount = await this.currentOrdersCount(agentId);
    return {
      ...agent,
      currentOrdersCount,
      canAcceptOrders: canAcceptOrders(agent, currentOrdersCount),
      successRate: successRate(agent),
    };
  }

  async currentOrdersCount(agentId: string): Promise<number> {
    const active = await this.storage.getAgentDeliveries(agentId, ACTIVE_DELIVERY_STATUSES);
    return active.length;
  }

  /**
   * Flips availability. Either direction needs an active ZIP coverage;
   * without one the agent is left untouched. Going available brings an
   * offline agent to active, going unavailable takes an active agent offline.
   */
  async toggleAvailability(agentId: string): Promise<DeliveryAgent> {
    const agent = await this.storage.updateAgentLocked(agentId, ({ agent: current, activeCoverages }) => {
      if (activeCoverages.length === 0) {
        throw new MissingCoverageError(agentId);
      }
      const isAvailable = !current.isAvailable;
      let status: AgentStatus = current.status;
      if (isAvailable && current.status === "offline") {
        status = "active";
      } else if (!isAvailable && current.status === "active") {
        status = "offline";
      }
      return { isAvailable, status };
    });
    if (!agent) {
      throw new AgentNotFoundError(agentId);
    }

    this.logger.info({ agentId, isAvailable: agent.isAvailable, status: agent.status }, "agent availability toggled");
    await this.emit(
      createDomainEvent({
        source: "service.agents",
        category: "agent.telemetry",
        name: "availability_changed",
        payload: { agentId, isAvailable: agent.isAvailable, status: agent.status },
        actor: { actorId: agentId, actorType: "agent" },
      }),
    );
    return agent;
  }

  async setStatus(agentId: string, status: AgentStatus): Promise<DeliveryAgent> {
    const agent = await this.storage.updateAgentLocked(agentId, () => ({ status }));
    if (!agent) {
      throw new AgentNotFoundError(agentId);
    }
    this.logger.info({ agentId, status }, "agent status updated");
    await this.emit(
      createDomainEvent({
        source: "service.agents",
        category: "agent.telemetry",
        name: "availability_changed",
        payload: { agentId, isAvailable: agent.isAvailable, status: agent.status },
        actor: { actorId: agentId, actorType: "agent" },
      }),
    );
    return agent;
  }

  async updateZipCoverage(agentId: string, zipAreaIds: readonly string[]): Promise<AgentZipCoverage[]> {
    await this.getAgent(agentId);
    const selected = Array.from(new Set(zipAreaIds));
    const areas = await this.storage.getZipAreasByIds(selected);
    const usable = new Set(areas.filter((area) => area.isActive).map((area) => area.id));
    const rejected = selected.filter((id) => !usable.has(id));
    if (rejected.length) {
      throw new InvalidZipAreaError(rejected);
    }

    const existing = await this.storage.getAgentZipCoverages(agentId);
    const changes = planCoverageUpdate(existing, selected);
    const coverages = await this.storage.applyCoverageChanges(agentId, changes);
    this.logger.info(
      {
        agentId,
        deactivated: changes.deactivate.length,
        reactivated: changes.reactivate.length,
        created: changes.create.length,
      },
      "agent zip coverage updated",
    );
    return coverages;
  }

  /**
   * Sets or clears the fixed fee charged for orders in one of the agent's ZIP
   * areas. The override applies to deliveries priced after the change.
   */
  async setCoverageFeeOverride(
    agentId: string,
    zipAreaId: string,
    override: string | null,
  ): Promise<AgentZipCoverage> {
    await this.getAgent(agentId);
    const coverage = await this.storage.setCoverageFeeOverride(agentId, zipAreaId, override);
    if (!coverage) {
      throw new CoverageNotFoundError(agentId, zipAreaId);
    }
    this.logger.info({ agentId, zipAreaId, deliveryFeeOverride: override }, "coverage fee override updated");
    return coverage;
  }

  async getActiveCoverages(agentId: string): Promise<AgentZipCoverage[]> {
    const coverages = await this.storage.getAgentZipCoverages(agentId);
    return coverages.filter((coverage) => coverage.isActive);
  }

  /**
   * Stores the agent's position. A delivery code that is unknown or belongs
   * to another agent adds no tracking point.
   */
  async updateLocation(agentId: string, input: LocationInput, now: Date = new Date()): Promise<LocationUpdateResult> {
    const result = await this.storage.recordAgentLocation(agentId, {
      latitude: input.latitude,
      longitude: input.longitude,
      recordedAt: now,
      deliveryCode: input.deliveryCode ?? undefined,
    });
    if (!result) {
      throw new AgentNotFoundError(agentId);
    }
    if (input.deliveryCode && !result.trackingPoint) {
      this.logger.debug({ agentId, deliveryCode: input.deliveryCode }, "location update for unknown delivery ignored");
    }

    await this.emit(
      createDomainEvent({
        source: "service.agents",
        category: "agent.telemetry",
        name: "location_updated",
        payload: {
          agentId,
          lat: input.latitude,
          lng: input.longitude,
          deliveryId: result.trackingPoint ? input.deliveryCode : null,
        },
        actor: { actorId: agentId, actorType: "agent" },
      }),
    );
    return result;
  }

  private async emit(event: DomainEvent): Promise<void> {
    try {
      await this.events.publish(event);
    } catch (error) {
      this.logger.error({ err: error, eventId: event.eventId, name: event.name }, "failed to publish agent event");
    }
  }
}
