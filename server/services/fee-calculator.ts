import type { Logger } from "pino";
import { z } from "zod";

import { feeCalculationMethodEnum, type FeeCalculationMethod } from "@shared/schema";

export interface DeliverySettings {
  calculationMethod: FeeCalculationMethod;
  baseDeliveryFee: number;
  feePerKm: number;
  minimumDeliveryFee: number;
  maximumDeliveryFee: number;
  freeDeliveryThreshold: number;
  agentPayoutPercentage: number;
}

export interface FeeInput {
  distanceKm?: number | null;
  orderValue?: number | null;
  // Per-ZIP override from the agent's coverage; replaces the method-specific amount
  feeOverride?: number | null;
}

export type DeliveryPricing = {
  deliveryFee: number;
  agentPayout: number;
  fallback: boolean;
};

export const DEFAULT_DELIVERY_SETTINGS: DeliverySettings = {
  calculationMethod: "fixed",
  baseDeliveryFee: 40,
  feePerKm: 5,
  minimumDeliveryFee: 30,
  maximumDeliveryFee: 150,
  freeDeliveryThreshold: 500,
  agentPayoutPercentage: 80,
};

export const FALLBACK_DELIVERY_FEE = 40;
export const FALLBACK_AGENT_PAYOUT = 32;

const amount = z.number().finite().nonnegative();

export const deliverySettingsSchema = z
  .object({
    calculationMethod: z.enum(feeCalculationMethodEnum),
    baseDeliveryFee: amount,
    feePerKm: amount,
    minimumDeliveryFee: amount,
    maximumDeliveryFee: amount,
    freeDeliveryThreshold: amount,
    agentPayoutPercentage: amount.max(100),
  })
  .refine((settings) => settings.minimumDeliveryFee <= settings.maximumDeliveryFee, {
    message: "Minimum delivery fee cannot exceed the maximum",
    path: ["minimumDeliveryFee"],
  });

export function roundMoney(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

function isPositive(value: number | null | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

/**
 * Delivery fee for one order under the given settings.
 *
 * Orders at or above the free-delivery threshold always ship for free, whatever
 * the calculation method. Any other fee is clamped into the configured
 * minimum/maximum. Methods that lack their input (no distance, no order value)
 * charge the base fee.
 */
export function calculateDeliveryFee(settings: DeliverySettings, input: FeeInput = {}): number {
  const config = deliverySettingsSchema.parse(settings);
  const { distanceKm, orderValue, feeOverride } = input;
  const value = isPositive(orderValue) ? orderValue : undefined;

  let fee: number;
  if (typeof feeOverride === "number" && Number.isFinite(feeOverride) && feeOverride >= 0) {
    fee = feeOverride;
  } else if (config.calculationMethod === "distance" && isPositive(distanceKm)) {
    fee = config.baseDeliveryFee + distanceKm * config.feePerKm;
  } else if (config.calculationMethod === "order_value" && value !== undefined) {
    if (value >= config.freeDeliveryThreshold) {
      return 0;
    }
    const discountFactor = Math.min(0.5, value / (config.freeDeliveryThreshold * 2));
    fee = config.baseDeliveryFee * (1 - discountFactor);
  } else {
    fee = config.baseDeliveryFee;
  }

  fee = Math.max(fee, config.minimumDeliveryFee);
  fee = Math.min(fee, config.maximumDeliveryFee);

  if (value !== undefined && value >= config.freeDeliveryThreshold) {
    return 0;
  }

  return roundMoney(fee);
}

export function calculateAgentPayout(settings: DeliverySettings, deliveryFee: number): number {
  const { agentPayoutPercentage } = deliverySettingsSchema.parse(settings);
  return roundMoney((deliveryFee * agentPayoutPercentage) / 100);
}

export function priceDelivery(
  settings: DeliverySettings | undefined,
  input: FeeInput,
  logger: Pick<Logger, "warn">,
): DeliveryPricing {
  try {
    if (!settings) {
      throw new Error("Delivery settings are not loaded");
    }
    const deliveryFee = calculateDeliveryFee(settings, input);
    return {
      deliveryFee,
      agentPayout: calculateAgentPayout(settings, deliveryFee),
      fallback: false,
    };
  } catch (error) {
    logger.warn({ err: error }, "Delivery fee calculation failed, using fallback pricing");
    return {
      deliveryFee: FALLBACK_DELIVERY_FEE,
      agentPayout: FALLBACK_AGENT_PAYOUT,
      fallback: true,
    };
  }
}
