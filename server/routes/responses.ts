import type { Response } from "express";
import type { Logger } from "pino";
import { ZodError } from "zod";

import type { TransitionResult } from "../services/delivery-state";
import { toDeliveryView } from "../services/deliveries";
import {
  AgentAlreadyRegisteredError,
  AgentNotFoundError,
  CoverageNotFoundError,
  DeliveryNotFoundError,
  DuplicateDeliveryError,
  InvalidZipAreaError,
  MissingCoverageError,
  RatingNotAllowedError,
  ZipAreaExistsError,
} from "../services/errors";

const TRANSITION_FAILURES = {
  not_found: { status: 404, message: "Delivery not found" },
  invalid_state: { status: 409, message: "Delivery is not in a state that allows this action. Please refresh and try again." },
  stale_state: { status: 409, message: "Delivery was updated by someone else. Please refresh and try again." },
  otp_mismatch: { status: 400, message: "Invalid OTP. Please check the code and try again." },
} as const;

export function sendTransition(res: Response, result: TransitionResult) {
  if (result.ok) {
    return res.json({ success: true, delivery: toDeliveryView(result.delivery) });
  }
  const failure = TRANSITION_FAILURES[result.reason];
  return res.status(failure.status).json({ success: false, reason: result.reason, message: failure.message });
}

function statusFor(error: unknown): number | undefined {
  if (error instanceof ZodError) return 400;
  if (error instanceof MissingCoverageError) return 400;
  if (error instanceof InvalidZipAreaError) return 400;
  if (error instanceof RatingNotAllowedError) return 400;
  if (error instanceof AgentNotFoundError) return 404;
  if (error instanceof DeliveryNotFoundError) return 404;
  if (error instanceof CoverageNotFoundError) return 404;
  if (error instanceof DuplicateDeliveryError) return 409;
  if (error instanceof AgentAlreadyRegisteredError) return 409;
  if (error instanceof ZipAreaExistsError) return 409;
  return undefined;
}

export function sendError(res: Response, error: unknown, logger: Logger, fallbackMessage: string) {
  if (error instanceof ZodError) {
    return res.status(400).json({ message: "Invalid request", errors: error.errors });
  }
  const status = statusFor(error);
  if (status !== undefined && error instanceof Error) {
    return res.status(status).json({ message: error.message });
  }
  logger.error({ err: error }, fallbackMessage);
  return res.status(500).json({ message: fallbackMessage });
}
