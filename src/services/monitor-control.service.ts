import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { MonitorEventType } from '../events/monitor-event-type.enum';
import type { MonitoringToggledEvent } from '../events/monitor-events';
import { IDeliveryStore } from '../interfaces/delivery-store.interface';
import { DELIVERY_STORE, MONITOR_MODULE_OPTIONS } from '../monitor.constants';
import { MonitoringFlag } from './monitoring-flag.service';
import { CycleResult, PollCycleService } from './poll-cycle.service';

export interface MonitorControlOptions {
  groups: number[];
}

export interface MonitorToggleResult {
  status: 'started' | 'stopped';
  message: string;
}

export interface MonitorStatus {
  enabled: boolean;
  lastCycleAt: Date | null;
  knownGroups: number[];
  lastCycle: CycleResult | null;
}

/**
 * Start/stop/status surface for an HTTP or CLI layer. Stopping only closes
 * the gate for the next cycle; open deliveries are left untouched.
 */
@Injectable()
export class MonitorControlService {
  private readonly logger = new Logger(MonitorControlService.name);

  constructor(
    private readonly flag: MonitoringFlag,
    private readonly pollCycle: PollCycleService,
    @Inject(DELIVERY_STORE) private readonly store: IDeliveryStore,
    private readonly eventEmitter: EventEmitter2,
    @Inject(MONITOR_MODULE_OPTIONS)
    private readonly options: MonitorControlOptions,
  ) {}

  async startMonitoring(): Promise<MonitorToggleResult> {
    this.flag.enable();
    this.logger.log('Button monitoring service started');
    await this.recordToggle(true, 'Button monitoring service started');

    return {
      status: 'started',
      message: 'Button monitoring service is now active',
    };
  }

  async stopMonitoring(): Promise<MonitorToggleResult> {
    this.flag.disable();
    this.logger.log('Button monitoring service stopped');
    await this.recordToggle(false, 'Button monitoring service stopped');

    return {
      status: 'stopped',
      message: 'Button monitoring service is now inactive',
    };
  }

  getStatus(): MonitorStatus {
    const lastCycle = this.pollCycle.getLastCycle();
    return {
      enabled: this.flag.isEnabled(),
      lastCycleAt: lastCycle?.finishedAt ?? null,
      knownGroups: [...this.options.groups],
      lastCycle,
    };
  }

  private async recordToggle(enabled: boolean, message: string): Promise<void> {
    try {
      await this.store.appendMaintenanceLog({
        logType: 'health_check',
        groupNumber: null,
        message,
        resolved: true,
      });
    } catch (error) {
      this.logger.error(
        `Failed to log monitoring ${enabled ? 'start' : 'stop'}`,
        error instanceof Error ? error.stack : error,
      );
    }

    try {
      this.eventEmitter.emit(
        enabled
          ? MonitorEventType.MONITORING_STARTED
          : MonitorEventType.MONITORING_STOPPED,
        { enabled, timestamp: new Date() } satisfies MonitoringToggledEvent,
      );
    } catch (error) {
      this.logger.error(
        'Monitoring toggle listeners failed',
        error instanceof Error ? error.stack : error,
      );
    }
  }
}
