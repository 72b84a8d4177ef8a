import { EventEmitter } from 'eventemitter3';
import type { DeferralReason } from '../timing/types.js';
import type { Exclusion } from '../selection/types.js';
import type { InterventionRecord } from '../history/types.js';
import type { Intervention } from '../recommendation/types.js';

export interface CadenceEvents {
  'decision:deferred': { userId: string; reason: DeferralReason; detail: string; timestamp: number };
  'intervention:recorded': { record: InterventionRecord; intervention: Intervention; score: number };
  'strategy:excluded': { userId: string; exclusion: Exclusion };
  'feedback:applied': { recordId: string; strategyName: string; effectiveness: number; weight: number };
  'delivery:failed': { userId: string; recordId: string; error: string };
}

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof CadenceEvents>(event: K, listener: (data: CadenceEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof CadenceEvents>(event: K, listener: (data: CadenceEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof CadenceEvents>(event: K, listener: (data: CadenceEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof CadenceEvents>(event: K, data: CadenceEvents[K]): void {
    this.emitter.emit(event, data);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
