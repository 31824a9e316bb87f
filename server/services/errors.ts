// Raised for conditions that abort an operation. State-machine and OTP
// failures are not errors; they come back as a TransitionResult.

export class AgentNotFoundError extends Error {
  constructor(readonly agentId: string) {
    super(`Delivery agent ${agentId} not found`);
    this.name = "AgentNotFoundError";
  }
}

export class DeliveryNotFoundError extends Error {
  constructor(readonly deliveryId: string) {
    super(`Delivery ${deliveryId} not found`);
    this.name = "DeliveryNotFoundError";
  }
}

export class MissingCoverageError extends Error {
  constructor(readonly agentId: string) {
    super("ZIP code required. Please set your service areas first.");
    this.name = "MissingCoverageError";
  }
}

export class DuplicateDeliveryError extends Error {
  constructor(readonly orderId: string) {
    super(`Order ${orderId} already has a delivery`);
    this.name = "DuplicateDeliveryError";
  }
}

export class RatingNotAllowedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RatingNotAllowedError";
  }
}

export class InvalidZipAreaError extends Error {
  constructor(readonly zipAreaIds: string[]) {
    super(`Unknown or inactive ZIP areas: ${zipAreaIds.join(", ")}`);
    this.name = "InvalidZipAreaError";
  }
}

export class AgentIdExhaustedError extends Error {
  constructor(attempts: number) {
    super(`Could not generate a unique agent id after ${attempts} attempts`);
    this.name = "AgentIdExhaustedError";
  }
}

export class AgentAlreadyRegisteredError extends Error {
  constructor(readonly userId: string) {
    super(`User ${userId} is already registered as a delivery agent`);
    this.name = "AgentAlreadyRegisteredError";
  }
}

export class ZipAreaExistsError extends Error {
  constructor(readonly zipCode: string) {
    super(`ZIP area ${zipCode} already exists`);
    this.name = "ZipAreaExistsError";
  }
}

export class CoverageNotFoundError extends Error {
  constructor(
    readonly agentId: string,
    readonly zipAreaId: string,
  ) {
    super(`Agent ${agentId} has no coverage for ZIP area ${zipAreaId}`);
    this.name = "CoverageNotFoundError";
  }
}
