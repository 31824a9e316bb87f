import { randomInt } from "node:crypto";

import type { Delivery, DeliveryStatus } from "@shared/schema";

export const TERMINAL_DELIVERY_STATUSES: readonly DeliveryStatus[] = ["delivered", "cancelled", "failed"];

export const ACTIVE_DELIVERY_STATUSES: readonly DeliveryStatus[] = [
  "assigned",
  "accepted",
  "at_store",
  "picked_up",
  "in_transit",
];

export const DELIVERY_STATUS_TRANSITIONS: Record<DeliveryStatus, DeliveryStatus[]> = {
  assigned: ["accepted", "cancelled", "failed"],
  accepted: ["at_store", "cancelled", "failed"],
  at_store: ["picked_up", "cancelled", "failed"],
  picked_up: ["in_transit", "delivered", "cancelled", "failed"],
  in_transit: ["delivered", "cancelled", "failed"],
  delivered: [],
  cancelled: [],
  failed: [],
};

export type DeliveryAction =
  | { type: "accept" }
  | { type: "arrive_at_store" }
  | { type: "pickup"; otp: string }
  | { type: "mark_in_transit" }
  | { type: "complete"; otp: string }
  | { type: "cancel" }
  | { type: "fail" };

export type TransitionFailureReason = "not_found" | "invalid_state" | "otp_mismatch" | "stale_state";

export type DeliveryStatusPatch = {
  status: DeliveryStatus;
} & Partial<
  Pick<
    Delivery,
    | "acceptedAt"
    | "arrivedAtStoreAt"
    | "pickedUpAt"
    | "deliveredAt"
    | "storePickupVerified"
    | "customerDeliveryVerified"
  >
>;

export type TransitionPlan =
  | { ok: true; expectedStatus: DeliveryStatus; patch: DeliveryStatusPatch }
  | { ok: false; reason: Exclude<TransitionFailureReason, "not_found" | "stale_state"> };

export type TransitionResult =
  | { ok: true; delivery: Delivery }
  | { ok: false; reason: TransitionFailureReason };

export function isTerminalStatus(status: DeliveryStatus): boolean {
  return TERMINAL_DELIVERY_STATUSES.includes(status);
}

export function canTransition(from: DeliveryStatus, to: DeliveryStatus): boolean {
  return DELIVERY_STATUS_TRANSITIONS[from].includes(to);
}

type StateSnapshot = Pick<
  Delivery,
  | "status"
  | "storePickupOtp"
  | "customerDeliveryOtp"
  | "acceptedAt"
  | "arrivedAtStoreAt"
  | "pickedUpAt"
  | "deliveredAt"
>;

/**
 * Works out what an action would change without touching storage. The caller
 * applies the patch with a conditional update on `expectedStatus`, so a
 * concurrent writer that got there first turns the plan into `stale_state`.
 *
 * OTPs are compared as exact strings.
 */
export function planTransition(delivery: StateSnapshot, action: DeliveryAction, now: Date = new Date()): TransitionPlan {
  const status = delivery.status;
  const invalid = { ok: false, reason: "invalid_state" } as const;

  switch (action.type) {
    case "accept":
      if (status !== "assigned") return invalid;
      return {
        ok: true,
        expectedStatus: status,
        patch: { status: "accepted", acceptedAt: delivery.acceptedAt ?? now },
      };
    case "arrive_at_store":
      if (status !== "accepted") return invalid;
      return {
        ok: true,
        expectedStatus: status,
        patch: { status: "at_store", arrivedAtStoreAt: delivery.arrivedAtStoreAt ?? now },
      };
    case "pickup":
      if (status !== "at_store") return invalid;
      if (action.otp !== delivery.storePickupOtp) return { ok: false, reason: "otp_mismatch" };
      return {
        ok: true,
        expectedStatus: status,
        patch: {
          status: "picked_up",
          storePickupVerified: true,
          pickedUpAt: delivery.pickedUpAt ?? now,
        },
      };
    case "mark_in_transit":
      if (status !== "picked_up") return invalid;
      return { ok: true, expectedStatus: status, patch: { status: "in_transit" } };
    case "complete":
      if (status !== "picked_up" && status !== "in_transit") return invalid;
      if (action.otp !== delivery.customerDeliveryOtp) return { ok: false, reason: "otp_mismatch" };
      return {
        ok: true,
        expectedStatus: status,
        patch: {
          status: "delivered",
          customerDeliveryVerified: true,
          deliveredAt: delivery.deliveredAt ?? now,
        },
      };
    case "cancel":
      if (isTerminalStatus(status)) return invalid;
      return { ok: true, expectedStatus: status, patch: { status: "cancelled" } };
    case "fail":
      if (isTerminalStatus(status)) return invalid;
      return { ok: true, expectedStatus: status, patch: { status: "failed" } };
  }
}

type RandomIndex = (max: number) => number;

const defaultRandomIndex: RandomIndex = (max) => randomInt(max);
const DIGITS = "0123456789";
const DELIVERY_ID_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

function randomString(alphabet: string, length: number, pick: RandomIndex): string {
  let result = "";
  for (let i = 0; i < length; i++) {
    result += alphabet[pick(alphabet.length)];
  }
  return result;
}

// DEL-YYMMDDHHMM-XXXX, clock in UTC
export function generateDeliveryId(now: Date = new Date(), pick: RandomIndex = defaultRandomIndex): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  const stamp = [
    pad(now.getUTCFullYear() % 100),
    pad(now.getUTCMonth() + 1),
    pad(now.getUTCDate()),
    pad(now.getUTCHours()),
    pad(now.getUTCMinutes()),
  ].join("");
  return `DEL-${stamp}-${randomString(DELIVERY_ID_ALPHABET, 4, pick)}`;
}

export function generateOtp(pick: RandomIndex = defaultRandomIndex): string {
  return randomString(DIGITS, 6, pick);
}

// Not collision-free; callers retry on the unique index
export function generateAgentId(pick: RandomIndex = defaultRandomIndex): string {
  return `AGT${randomString(DIGITS, 4, pick)}`;
}

export type DeliveryStatusStep = {
  key: DeliveryStatus;
  name: string;
  complete: boolean;
  active: boolean;
  timestamp: string | null;
};

const FORWARD_STEPS: Array<{ key: DeliveryStatus; name: string; timestamp: (d: Delivery) => Date | null }> = [
  { key: "assigned", name: "Assigned", timestamp: (d) => d.assignedAt },
  { key: "accepted", name: "Accepted", timestamp: (d) => d.acceptedAt },
  { key: "at_store", name: "At Store", timestamp: (d) => d.arrivedAtStoreAt },
  { key: "picked_up", name: "Picked Up", timestamp: (d) => d.pickedUpAt },
  { key: "in_transit", name: "In Transit", timestamp: () => null },
  { key: "delivered", name: "Delivered", timestamp: (d) => d.deliveredAt },
];

export function buildStatusSteps(delivery: Delivery): DeliveryStatusStep[] {
  const reached = FORWARD_STEPS.findIndex((step) => step.key === delivery.status);
  return FORWARD_STEPS.map((step, index) => ({
    key: step.key,
    name: step.name,
    // Side exits leave progress where the milestones stopped
    complete: reached === -1 ? step.timestamp(delivery) !== null : index <= reached,
    active: step.key === delivery.status,
    timestamp: step.timestamp(delivery)?.toISOString() ?? null,
  }));
}
