import type { AnalysisConfig, WireConfig } from '../domain/types.js';
import type { ConfigUpdate } from '../utils/validators.js';
import { logger } from '../utils/logger.js';

/**
 * Operator-adjustable analysis bounds. Readers take a copy at the start of a pass, so an
 * update lands on the next pass and never on one already running.
 */
export class RuntimeConfig {
  private value: AnalysisConfig;

  constructor(initial: AnalysisConfig) {
    this.value = { ...initial };
  }

  get(): AnalysisConfig {
    return { ...this.value };
  }

  update(u: ConfigUpdate): AnalysisConfig {
    this.value = {
      ...this.value,
      minCycle: u.min_cycle,
      maxCycle: u.max_cycle,
      minStrength: u.min_strength,
      maxStrength: u.max_strength,
    };
    logger.info({ config: this.value }, 'analysis config updated');
    return this.get();
  }
}

export function toWireConfig(c: AnalysisConfig): WireConfig {
  return {
    symbol: c.symbol,
    min_cycle: c.minCycle,
    max_cycle: c.maxCycle,
    min_strength: c.minStrength,
    max_strength: c.maxStrength,
  };
}
