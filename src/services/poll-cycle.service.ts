import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { RecordStoreWriteFailedError } from '../errors/record-store-write-failed.error';
import { MonitorEventType } from '../events/monitor-event-type.enum';
import type { CycleCompletedEvent } from '../events/monitor-events';
import {
  TransitionEvent,
  TransitionKind,
} from '../interfaces/transition-event.interface';
import { MONITOR_MODULE_OPTIONS } from '../monitor.constants';
import {
  DeliveryLifecycleTracker,
  LifecycleOutcome,
} from './delivery-lifecycle.service';
import { MonitoringFlag } from './monitoring-flag.service';
import { TransitionDetector } from './transition-detector.service';

export interface PollCycleOptions {
  groups: number[];
}

export type CycleStatus = 'completed' | 'disabled' | 'skipped';

export type CycleActivityType =
  | 'delivery_started'
  | 'delivery_completed'
  | 'delivery_failed'
  | 'duplicate_open_record'
  | 'read_failed';

export interface CycleActivity {
  type: CycleActivityType;
  group: number;
  coffeeType?: string;
  deliveryId?: string;
  retroactive?: boolean;
  message?: string;
}

export interface CycleWarning {
  group: number;
  error: string;
}

export interface CycleResult {
  status: CycleStatus;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  groupsScanned: number;
  activities: CycleActivity[];
  warnings: CycleWarning[];
  /** Groups whose last successful read shows an active delivery */
  activeGroups: number[];
}

interface GroupScan {
  activity?: CycleActivity;
  warning?: CycleWarning;
}

function toActivity(
  event: TransitionEvent,
  outcome: LifecycleOutcome,
): CycleActivity | undefined {
  const record = outcome.record;
  switch (outcome.action) {
    case 'created':
      return {
        type: 'delivery_started',
        group: event.groupId,
        coffeeType: record?.coffeeType,
        deliveryId: record?.id,
      };
    case 'completed':
    case 'retroactive':
      return {
        type: 'delivery_completed',
        group: event.groupId,
        coffeeType: record?.coffeeType,
        deliveryId: record?.id,
        retroactive: outcome.action === 'retroactive',
      };
    case 'failed':
      return {
        type: 'delivery_failed',
        group: event.groupId,
        coffeeType: record?.coffeeType,
        deliveryId: record?.id,
        message: record?.errorMessage ?? undefined,
      };
    case 'duplicate':
      return {
        type: 'duplicate_open_record',
        group: event.groupId,
        deliveryId: record?.id,
        message: outcome.conflict?.message,
      };
    case 'none':
      return event.kind === TransitionKind.READ_FAILED
        ? { type: 'read_failed', group: event.groupId, message: event.reason }
        : undefined;
  }
}

/**
 * Entry point of every cadence tick: flag gate, then one detector + tracker
 * pass per configured group.
 *
 * A tick that arrives while the previous cycle is still running is skipped
 * rather than queued.
 */
@Injectable()
export class PollCycleService {
  private readonly logger = new Logger(PollCycleService.name);
  private running = false;
  private scannedGeneration = 0;
  private lastCycle: CycleResult | null = null;
  /** Groups whose open record was failed by a read error, until an idle read */
  private readonly failedGroups = new Set<number>();

  constructor(
    private readonly flag: MonitoringFlag,
    private readonly detector: TransitionDetector,
    private readonly tracker: DeliveryLifecycleTracker,
    private readonly eventEmitter: EventEmitter2,
    @Inject(MONITOR_MODULE_OPTIONS)
    private readonly options: PollCycleOptions,
  ) {}

  async runCycle(): Promise<CycleResult> {
    const startedAt = new Date();

    if (this.running) {
      this.logger.debug('Previous poll cycle still running, skipping tick');
      return this.emptyResult('skipped', startedAt);
    }

    if (!this.flag.isEnabled()) {
      return this.emptyResult('disabled', startedAt);
    }

    this.running = true;
    try {
      const generation = this.flag.getGeneration();
      if (generation !== this.scannedGeneration) {
        this.detector.reset();
        this.scannedGeneration = generation;
      }

      const scans = await Promise.all(
        this.options.groups.map((group) => this.scanGroup(group)),
      );

      const finishedAt = new Date();
      const result: CycleResult = {
        status: 'completed',
        startedAt,
        finishedAt,
        durationMs: finishedAt.getTime() - startedAt.getTime(),
        groupsScanned: scans.length,
        activities: scans.flatMap((scan) =>
          scan.activity ? [scan.activity] : [],
        ),
        warnings: scans.flatMap((scan) => (scan.warning ? [scan.warning] : [])),
        activeGroups: this.options.groups.filter(
          (group) =>
            this.detector.getLastSnapshot(group)?.activityState === 'active',
        ),
      };

      this.lastCycle = result;
      this.report(result);
      return result;
    } finally {
      this.running = false;
    }
  }

  getLastCycle(): CycleResult | null {
    return this.lastCycle;
  }

  isRunning(): boolean {
    return this.running;
  }

  private async scanGroup(group: number): Promise<GroupScan> {
    let event: TransitionEvent | undefined;
    try {
      event = this.markFailedRead(await this.detector.detect(group));
      const outcome = await this.tracker.apply(event);

      if (
        event.kind === TransitionKind.READ_FAILED &&
        outcome.action === 'failed'
      ) {
        // The delivery is closed as failed; re-baseline instead of reporting
        // a completion for it once the group answers again.
        this.detector.forget(group);
        this.failedGroups.add(group);
      }

      return { activity: toActivity(event, outcome) };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (error instanceof RecordStoreWriteFailedError) {
        this.logger.warn(message);
      } else {
        this.logger.error(
          `Unexpected error while scanning group ${group}`,
          error instanceof Error ? error.stack : error,
        );
      }
      return {
        activity: this.pendingActivity(event),
        warning: { group, error: message },
      };
    }
  }

  /**
   * Flags the first completion after a failed read, and clears the mark once
   * the group is seen idle.
   */
  private markFailedRead(event: TransitionEvent): TransitionEvent {
    if (!this.failedGroups.has(event.groupId)) return event;

    if (event.kind === TransitionKind.PRESS_COMPLETED) {
      this.failedGroups.delete(event.groupId);
      return { ...event, afterFailedRead: true };
    }
    if (event.kind === TransitionKind.NO_CHANGE && event.state === 'idle') {
      this.failedGroups.delete(event.groupId);
    }
    return event;
  }

  /** Activity of an event whose store write did not go through. */
  private pendingActivity(
    event: TransitionEvent | undefined,
  ): CycleActivity | undefined {
    if (event?.kind !== TransitionKind.READ_FAILED) return undefined;
    return { type: 'read_failed', group: event.groupId, message: event.reason };
  }

  private report(result: CycleResult): void {
    if (result.activities.length > 0) {
      this.logger.log(
        `Button monitor detected ${result.activities.length} activities`,
      );
    }

    try {
      this.eventEmitter.emit(MonitorEventType.CYCLE_COMPLETED, {
        activityCount: result.activities.length,
        warningCount: result.warnings.length,
        groupsScanned: result.groupsScanned,
        durationMs: result.durationMs,
        timestamp: result.finishedAt,
      } satisfies CycleCompletedEvent);
    } catch (error) {
      this.logger.error(
        'Cycle listeners failed',
        error instanceof Error ? error.stack : error,
      );
    }
  }

  private emptyResult(status: CycleStatus, startedAt: Date): CycleResult {
    const finishedAt = new Date();
    return {
      status,
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      groupsScanned: 0,
      activities: [],
      warnings: [],
      activeGroups: [],
    };
  }
}
