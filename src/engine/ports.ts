/**
 * Collaborator ports. Implementations live outside the engine.
 */

import type { RawSignals } from '../context/types.js';
import type { Intervention } from '../recommendation/types.js';

/** User telemetry / state provider. */
export interface SignalProvider {
  getRawSignals(userId: string): Promise<RawSignals>;
}

export interface DeliveryAck {
  accepted: boolean;
  channel?: string;
}

/** Delivery channel; the engine does not wait for it. */
export interface DeliveryChannel {
  deliver(userId: string, intervention: Intervention): Promise<DeliveryAck>;
}
