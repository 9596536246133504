import { EventEmitter } from 'node:events';

import type { ComplexityAnalysis, LoadSnapshot } from './types.js';

export type AdmissionEventName = 'query_accepted' | 'query_warning' | 'query_rejected';

export type AdmissionEvent = {
  measurements: { cost: number; normalizedScore: number; loadFactor: number };
  metadata: {
    target: string;
    adapter: string;
    effectiveLimit: number;
    cached: boolean;
    analysis: ComplexityAnalysis;
    load: LoadSnapshot;
  };
};

export type AdmissionListener = (event: AdmissionEvent) => void;

/** Typed facade over an EventEmitter carrying admission outcomes. */
export class AdmissionTelemetry {
  private readonly emitter = new EventEmitter();

  on(name: AdmissionEventName, listener: AdmissionListener): () => void {
    this.emitter.on(name, listener);
    return () => {
      this.emitter.off(name, listener);
    };
  }

  once(name: AdmissionEventName, listener: AdmissionListener): void {
    this.emitter.once(name, listener);
  }

  emit(name: AdmissionEventName, event: AdmissionEvent): void {
    this.emitter.emit(name, event);
  }

  listenerCount(name: AdmissionEventName): number {
    return this.emitter.listenerCount(name);
  }
}
