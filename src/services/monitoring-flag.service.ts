import { Inject, Injectable, Optional } from '@nestjs/common';
import { MONITOR_MODULE_OPTIONS } from '../monitor.constants';

export interface MonitoringFlagOptions {
  startEnabled: boolean;
}

/**
 * Process-wide on/off switch read once at the top of every poll cycle.
 *
 * Every disabled -> enabled change bumps the generation, so a cycle can tell
 * that baselines captured before the last re-enable are stale.
 */
@Injectable()
export class MonitoringFlag {
  private enabled: boolean;
  private generation: number;

  constructor(
    @Optional()
    @Inject(MONITOR_MODULE_OPTIONS)
    options?: MonitoringFlagOptions,
  ) {
    this.enabled = options?.startEnabled ?? false;
    this.generation = this.enabled ? 1 : 0;
  }

  enable(): void {
    if (this.enabled) return;
    this.enabled = true;
    this.generation++;
  }

  disable(): void {
    this.enabled = false;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  getGeneration(): number {
    return this.generation;
  }
}
