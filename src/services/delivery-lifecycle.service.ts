import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { nextDeliveryStatus } from '../engines/delivery-status.machine';
import { DuplicateOpenRecordError } from '../errors/duplicate-open-record.error';
import { RecordStoreWriteFailedError } from '../errors/record-store-write-failed.error';
import { MonitorEventType } from '../events/monitor-event-type.enum';
import type {
  DeliveryCompletedEvent,
  DeliveryFailedEvent,
  DeliveryStartedEvent,
} from '../events/monitor-events';
import {
  DeliveryRecord,
  DeliveryStatus,
  MaintenanceLogType,
  TriggerType,
} from '../interfaces/delivery-records.interface';
import { IDeliveryStore } from '../interfaces/delivery-store.interface';
import {
  PressCompletedEvent,
  PressStartedEvent,
  ReadFailedEvent,
  TransitionEvent,
  TransitionKind,
} from '../interfaces/transition-event.interface';
import {
  DELIVERY_STORE,
  HARDWARE_UNAVAILABLE_MESSAGE,
  UNKNOWN_COFFEE_TYPE,
} from '../monitor.constants';

export type LifecycleAction =
  | 'created'
  | 'completed'
  | 'retroactive'
  | 'failed'
  | 'duplicate'
  | 'none';

export interface LifecycleOutcome {
  action: LifecycleAction;
  record?: DeliveryRecord;
  /** Set when the event was absorbed as a conflict */
  conflict?: DuplicateOpenRecordError;
}

function logTypeFor(coffeeType: string): MaintenanceLogType {
  return coffeeType === 'purge' ? 'purge' : 'manual_delivery';
}

@Injectable()
export class DeliveryLifecycleTracker {
  private readonly logger = new Logger(DeliveryLifecycleTracker.name);

  constructor(
    @Inject(DELIVERY_STORE) private readonly store: IDeliveryStore,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Applies one transition event to the record store.
   * Store failures are rethrown as RecordStoreWriteFailedError.
   */
  async apply(event: TransitionEvent): Promise<LifecycleOutcome> {
    if (event.kind === TransitionKind.NO_CHANGE) {
      return { action: 'none' };
    }

    let outcome: LifecycleOutcome;
    try {
      outcome = await this.dispatch(event);
    } catch (error) {
      throw new RecordStoreWriteFailedError(event.groupId, error);
    }

    this.emitOutcome(outcome);
    return outcome;
  }

  private dispatch(
    event: PressStartedEvent | PressCompletedEvent | ReadFailedEvent,
  ): Promise<LifecycleOutcome> {
    switch (event.kind) {
      case TransitionKind.PRESS_STARTED:
        return this.onPressStarted(event);
      case TransitionKind.PRESS_COMPLETED:
        return this.onPressCompleted(event);
      case TransitionKind.READ_FAILED:
        return this.onReadFailed(event);
    }
  }

  private onPressStarted(event: PressStartedEvent): Promise<LifecycleOutcome> {
    return this.store.transaction<LifecycleOutcome>(async (tx) => {
      const open = await tx.findOpenRecord(event.groupId, true);
      if (open) {
        const conflict = new DuplicateOpenRecordError(event.groupId, open.id);
        this.logger.warn(conflict.message);
        return { action: 'duplicate', record: open, conflict };
      }

      const coffeeType = event.coffeeType ?? UNKNOWN_COFFEE_TYPE;
      const record = await tx.createRecord({
        coffeeType,
        groupNumber: event.groupId,
        status: DeliveryStatus.STARTED,
        triggerType: TriggerType.MANUAL,
        startedAt: event.observedAt,
        completedAt: null,
        errorMessage: null,
        retroactive: false,
      });

      await tx.appendMaintenanceLog({
        logType: logTypeFor(coffeeType),
        groupNumber: event.groupId,
        message: `Manual ${coffeeType} delivery started via physical button on group ${event.groupId}`,
        resolved: true,
      });

      this.logger.log(
        `Manual delivery started: ${coffeeType} on group ${event.groupId} (${record.id})`,
      );
      return { action: 'created', record };
    });
  }

  private onPressCompleted(
    event: PressCompletedEvent,
  ): Promise<LifecycleOutcome> {
    return this.store.transaction<LifecycleOutcome>(async (tx) => {
      const open = await tx.findOpenRecord(event.groupId, true);

      if (!open && event.afterFailedRead) {
        // Same activity as the record already closed as failed.
        this.logger.debug(
          `Completion on group ${event.groupId} belongs to a failed delivery, ignoring`,
        );
        return { action: 'none' };
      }

      let record: DeliveryRecord;
      let action: LifecycleAction;
      if (open) {
        record = await tx.updateRecord(open.id, {
          status: nextDeliveryStatus(open.status, 'complete'),
          completedAt: event.observedAt,
        });
        action = 'completed';
      } else {
        // Monitoring was enabled mid-delivery: keep the completion, best effort.
        record = await tx.createRecord({
          coffeeType: event.coffeeType ?? UNKNOWN_COFFEE_TYPE,
          groupNumber: event.groupId,
          status: DeliveryStatus.COMPLETED,
          triggerType: TriggerType.MANUAL,
          startedAt: event.observedAt,
          completedAt: event.observedAt,
          errorMessage: null,
          retroactive: true,
        });
        action = 'retroactive';
      }

      await tx.appendMaintenanceLog({
        logType: logTypeFor(record.coffeeType),
        groupNumber: event.groupId,
        message: `Manual ${record.coffeeType} delivery completed on group ${event.groupId}`,
        resolved: true,
      });

      this.logger.log(
        `Manual delivery completed: ${record.coffeeType} on group ${event.groupId} (${record.id}${action === 'retroactive' ? ', retroactive' : ''})`,
      );
      return { action, record };
    });
  }

  private onReadFailed(event: ReadFailedEvent): Promise<LifecycleOutcome> {
    return this.store.transaction<LifecycleOutcome>(async (tx) => {
      const open = await tx.findOpenRecord(event.groupId, true);
      if (!open) {
        return { action: 'none' };
      }

      const record = await tx.updateRecord(open.id, {
        status: nextDeliveryStatus(open.status, 'fail'),
        errorMessage: HARDWARE_UNAVAILABLE_MESSAGE,
      });

      await tx.appendMaintenanceLog({
        logType: 'connection_issue',
        groupNumber: event.groupId,
        message: `Delivery ${record.id} on group ${event.groupId} failed: ${event.reason}`,
        resolved: false,
      });

      this.logger.warn(
        `Manual delivery ${record.id} on group ${event.groupId} failed: ${event.reason}`,
      );
      return { action: 'failed', record };
    });
  }

  private emitOutcome(outcome: LifecycleOutcome): void {
    const record = outcome.record;
    if (!record) return;

    try {
      switch (outcome.action) {
        case 'created':
          this.eventEmitter.emit(MonitorEventType.DELIVERY_STARTED, {
            deliveryId: record.id,
            groupNumber: record.groupNumber,
            coffeeType: record.coffeeType,
            startedAt: record.startedAt,
            timestamp: new Date(),
          } satisfies DeliveryStartedEvent);
          break;
        case 'completed':
        case 'retroactive':
          this.eventEmitter.emit(MonitorEventType.DELIVERY_COMPLETED, {
            deliveryId: record.id,
            groupNumber: record.groupNumber,
            coffeeType: record.coffeeType,
            startedAt: record.startedAt,
            completedAt: record.completedAt ?? record.startedAt,
            retroactive: record.retroactive,
            timestamp: new Date(),
          } satisfies DeliveryCompletedEvent);
          break;
        case 'failed':
          this.eventEmitter.emit(MonitorEventType.DELIVERY_FAILED, {
            deliveryId: record.id,
            groupNumber: record.groupNumber,
            coffeeType: record.coffeeType,
            errorMessage: record.errorMessage ?? HARDWARE_UNAVAILABLE_MESSAGE,
            timestamp: new Date(),
          } satisfies DeliveryFailedEvent);
          break;
        default:
          break;
      }
    } catch (error) {
      this.logger.error(
        `Delivery event listeners failed for ${record.id}`,
        error instanceof Error ? error.stack : error,
      );
    }
  }
}
