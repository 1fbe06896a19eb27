import type { BreakerState } from "./types.js";

export interface BreakerSnapshot {
  name: string;
  state: BreakerState;
  openedAtMs?: number;
  halfOpenInFlight: number;
  windowCount: number;
  windowFailures: number;
}

export interface GatewaySnapshot {
  upstream: string;
  maxAttempts: number;
  breaker: BreakerSnapshot;
}
