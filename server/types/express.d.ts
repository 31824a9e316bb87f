import type { DeliveryAgent } from "@shared/schema";

declare global {
  namespace Express {
    interface Request {
      // Set by requireAgent
      agent?: DeliveryAgent;
    }
  }
}

export {};
