import 'reflect-metadata';

// Module
export { DeliveryMonitorModule } from './monitor.module';

// Services
export { MonitoringFlag } from './services/monitoring-flag.service';
export { TransitionDetector } from './services/transition-detector.service';
export { DeliveryLifecycleTracker } from './services/delivery-lifecycle.service';
export type {
  LifecycleAction,
  LifecycleOutcome,
} from './services/delivery-lifecycle.service';
export { PollCycleService } from './services/poll-cycle.service';
export type {
  CycleActivity,
  CycleActivityType,
  CycleResult,
  CycleStatus,
  CycleWarning,
} from './services/poll-cycle.service';
export { MonitorControlService } from './services/monitor-control.service';
export type {
  MonitorStatus,
  MonitorToggleResult,
} from './services/monitor-control.service';
export { DeliveryReportService } from './services/delivery-report.service';
export { PollSchedulerService } from './services/poll-scheduler.service';

// Readers
export { GroupSelectionReader } from './readers/group-selection.reader';
export type { GroupSelectionSource } from './readers/group-selection.reader';

// Status machine
export {
  allowedDeliveryActions,
  nextDeliveryStatus,
} from './engines/delivery-status.machine';
export type { DeliveryAction } from './engines/delivery-status.machine';

// Interfaces
export { IDeliveryStore } from './interfaces/delivery-store.interface';
export {
  COFFEE_TYPES,
  ActivityState,
  CoffeeType,
  GroupSelection,
  IRegisterReader,
  RegisterSnapshot,
} from './interfaces/register-reader.interface';
export {
  DeliveryStatus,
  TriggerType,
  OPEN_DELIVERY_STATUSES,
  DeliveryRecord,
  CreateDeliveryInput,
  UpdateDeliveryInput,
  MaintenanceLogType,
  MaintenanceLogEntry,
  DeliveryQuery,
  DeliveryPage,
  isOpenStatus,
} from './interfaces/delivery-records.interface';
export {
  TransitionKind,
  TransitionEvent,
  PressStartedEvent,
  PressCompletedEvent,
  ReadFailedEvent,
  NoChangeEvent,
} from './interfaces/transition-event.interface';
export {
  DeliveryMonitorModuleOptions,
  DeliveryMonitorModuleAsyncOptions,
  ResolvedMonitorOptions,
} from './interfaces/monitor-module-options.interface';

// Stores
export { InMemoryDeliveryStore } from './adapters/in-memory-delivery.store';
export { PgDeliveryStore } from './adapters/pg-delivery.store';
export {
  DrizzleDeliveryStore,
  DrizzleSqlExecutor,
} from './adapters/drizzle-delivery.store';
export {
  PrismaDeliveryStore,
  PrismaRawExecutor,
  PrismaTransactionRunner,
} from './adapters/prisma-delivery.store';

// Errors
export { HardwareUnavailableError } from './errors/hardware-unavailable.error';
export { DuplicateOpenRecordError } from './errors/duplicate-open-record.error';
export { RecordStoreWriteFailedError } from './errors/record-store-write-failed.error';
export { InvalidStatusTransitionError } from './errors/invalid-status-transition.error';
export { InvalidMonitorOptionsError } from './errors/invalid-monitor-options.error';

// Events
export { MonitorEventType } from './events/monitor-event-type.enum';
export {
  DeliveryStartedEvent,
  DeliveryCompletedEvent,
  DeliveryFailedEvent,
  CycleCompletedEvent,
  MonitoringToggledEvent,
} from './events/monitor-events';

// CLI
export { generateMigration } from './cli/generate-migration';

// Constants
export {
  MONITOR_MODULE_OPTIONS,
  DELIVERY_STORE,
  REGISTER_READER,
  DEFAULT_GROUPS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_TABLE_NAME,
  POLL_INTERVAL_NAME,
} from './monitor.constants';
