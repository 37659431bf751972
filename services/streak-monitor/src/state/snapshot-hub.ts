// src/state/snapshot-hub.ts
import type { AnalysisConfig, King, MonitorStatus, Snapshot } from '../domain/types.js';
import { toWireConfig } from './runtime-config.js';
import { logger } from '../utils/logger.js';

type Listener = (s: Snapshot) => void;

/** Latest published analysis state, read by the HTTP layer and fan-out sinks. */
export class SnapshotHub {
  private snapshot: Snapshot;
  private readonly listeners = new Set<Listener>();

  constructor(config: AnalysisConfig) {
    this.snapshot = {
      status: 'Initializing...',
      last_update: new Date().toISOString(),
      price: null,
      kings: [],
      config: toWireConfig(config),
    };
  }

  current(): Snapshot {
    return { ...this.snapshot, kings: [...this.snapshot.kings], config: { ...this.snapshot.config } };
  }

  setStatus(status: MonitorStatus) {
    if (this.snapshot.status === status) return;
    this.snapshot = { ...this.snapshot, status };
    this.notify();
  }

  setPrice(price: number) {
    this.snapshot = { ...this.snapshot, price };
  }

  publish(p: { kings: King[]; config: AnalysisConfig; price?: number | null }): Snapshot {
    this.snapshot = {
      ...this.snapshot,
      last_update: new Date().toISOString(),
      price: p.price ?? this.snapshot.price,
      kings: [...p.kings],
      config: toWireConfig(p.config),
    };
    this.notify();
    return this.current();
  }

  subscribe(fn: Listener): () => void {
    this.listeners.add(fn);
    return () => this.listeners.delete(fn);
  }

  private notify() {
    const s = this.current();
    for (const fn of this.listeners) {
      try {
        fn(s);
      } catch (err) {
        logger.error({ err }, 'snapshot listener failed');
      }
    }
  }
}
