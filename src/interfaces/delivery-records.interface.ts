export enum DeliveryStatus {
  STARTED = 'started',
  IN_PROGRESS = 'in_progress',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

export enum TriggerType {
  /** Issued through the remote control interface */
  API = 'api',
  /** Detected from the physical buttons on the machine */
  MANUAL = 'manual',
  AUTOMATIC = 'automatic',
}

export const OPEN_DELIVERY_STATUSES: readonly DeliveryStatus[] = [
  DeliveryStatus.STARTED,
  DeliveryStatus.IN_PROGRESS,
];

export interface DeliveryRecord {
  id: string;
  coffeeType: string;
  groupNumber: number;
  status: DeliveryStatus;
  triggerType: TriggerType;
  startedAt: Date;
  completedAt: Date | null;
  errorMessage: string | null;
  /** Created at completion time because no open record existed */
  retroactive: boolean;
}

export type CreateDeliveryInput = Omit<DeliveryRecord, 'id'>;

export type UpdateDeliveryInput = Partial<
  Pick<DeliveryRecord, 'coffeeType' | 'status' | 'completedAt' | 'errorMessage'>
>;

export type MaintenanceLogType =
  | 'manual_delivery'
  | 'purge'
  | 'health_check'
  | 'connection_issue';

export interface MaintenanceLogEntry {
  logType: MaintenanceLogType;
  groupNumber: number | null;
  message: string;
  resolved: boolean;
}

export interface DeliveryQuery {
  groupNumber?: number;
  status?: DeliveryStatus;
  /** Inclusive lower bound on startedAt */
  since?: Date;
  /** Exclusive upper bound on startedAt */
  until?: Date;
  limit?: number;
  offset?: number;
}

export interface DeliveryPage {
  /** Number of records matching the filter, ignoring limit and offset */
  count: number;
  records: DeliveryRecord[];
}

export function isOpenStatus(status: DeliveryStatus): boolean {
  return OPEN_DELIVERY_STATUSES.includes(status);
}

const DELIVERY_STATUS_VALUES: readonly string[] = Object.values(DeliveryStatus);
const TRIGGER_TYPE_VALUES: readonly string[] = Object.values(TriggerType);

export function isDeliveryStatus(value: unknown): value is DeliveryStatus {
  return typeof value === 'string' && DELIVERY_STATUS_VALUES.includes(value);
}

export function isTriggerType(value: unknown): value is TriggerType {
  return typeof value === 'string' && TRIGGER_TYPE_VALUES.includes(value);
}
