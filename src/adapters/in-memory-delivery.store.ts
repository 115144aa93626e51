import { randomUUID } from 'crypto';
import {
  CreateDeliveryInput,
  DeliveryPage,
  DeliveryQuery,
  DeliveryRecord,
  isOpenStatus,
  MaintenanceLogEntry,
  TriggerType,
  UpdateDeliveryInput,
} from '../interfaces/delivery-records.interface';
import { IDeliveryStore } from '../interfaces/delivery-store.interface';
import { DEFAULT_TABLE_NAME } from '../monitor.constants';
import { assertTableName } from './delivery-row';

export interface StoredMaintenanceLog extends MaintenanceLogEntry {
  id: string;
  createdAt: Date;
}

interface InMemoryState {
  deliveries: Map<string, DeliveryRecord>;
  logs: StoredMaintenanceLog[];
}

function cloneRecord(record: DeliveryRecord): DeliveryRecord {
  return {
    ...record,
    startedAt: new Date(record.startedAt),
    completedAt: record.completedAt ? new Date(record.completedAt) : null,
  };
}

function cloneLog(entry: StoredMaintenanceLog): StoredMaintenanceLog {
  return { ...entry, createdAt: new Date(entry.createdAt) };
}

function createEmptyState(): InMemoryState {
  return { deliveries: new Map<string, DeliveryRecord>(), logs: [] };
}

function cloneState(state: InMemoryState): InMemoryState {
  const deliveries = new Map<string, DeliveryRecord>();
  for (const [id, record] of state.deliveries.entries()) {
    deliveries.set(id, cloneRecord(record));
  }
  return { deliveries, logs: state.logs.map((entry) => cloneLog(entry)) };
}

function matches(
  record: DeliveryRecord,
  triggerType: TriggerType,
  query: DeliveryQuery,
): boolean {
  if (record.triggerType !== triggerType) return false;
  if (
    query.groupNumber !== undefined &&
    record.groupNumber !== query.groupNumber
  ) {
    return false;
  }
  if (query.status !== undefined && record.status !== query.status) {
    return false;
  }
  if (query.since && record.startedAt.getTime() < query.since.getTime()) {
    return false;
  }
  if (query.until && record.startedAt.getTime() >= query.until.getTime()) {
    return false;
  }
  return true;
}

/**
 * Process-local store. Transactions are serialized and run against a copy of
 * the state that replaces it only when the callback resolves; writes made
 * outside a transaction are wrapped in one.
 */
export class InMemoryDeliveryStore implements IDeliveryStore {
  private state: InMemoryState;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly tableName: string = DEFAULT_TABLE_NAME,
    state?: InMemoryState,
    private readonly transactionBound = false,
  ) {
    assertTableName(tableName);
    this.state = state ?? createEmptyState();
  }

  async findOpenRecord(
    groupNumber: number,
    _lock?: boolean,
  ): Promise<DeliveryRecord | null> {
    const open = this.openRecordOf(groupNumber);
    return open ? cloneRecord(open) : null;
  }

  async createRecord(data: CreateDeliveryInput): Promise<DeliveryRecord> {
    if (!this.transactionBound) {
      return this.transaction((tx) => tx.createRecord(data));
    }

    if (isOpenStatus(data.status)) {
      const open = this.openRecordOf(data.groupNumber);
      if (open) {
        throw new Error(
          `${this.tableName}: group ${data.groupNumber} already has open delivery ${open.id}`,
        );
      }
    }

    const record: DeliveryRecord = cloneRecord({ ...data, id: randomUUID() });
    this.state.deliveries.set(record.id, record);
    return cloneRecord(record);
  }

  async updateRecord(
    id: string,
    data: UpdateDeliveryInput,
  ): Promise<DeliveryRecord> {
    if (!this.transactionBound) {
      return this.transaction((tx) => tx.updateRecord(id, data));
    }

    const existing = this.state.deliveries.get(id);
    if (!existing) {
      throw new Error(`${this.tableName}: delivery ${id} not found`);
    }

    const updated: DeliveryRecord = {
      ...existing,
      coffeeType: data.coffeeType ?? existing.coffeeType,
      status: data.status ?? existing.status,
      completedAt:
        data.completedAt !== undefined
          ? data.completedAt && new Date(data.completedAt)
          : existing.completedAt,
      errorMessage:
        data.errorMessage !== undefined
          ? data.errorMessage
          : existing.errorMessage,
    };
    this.state.deliveries.set(id, updated);
    return cloneRecord(updated);
  }

  async findByTriggerType(
    triggerType: TriggerType,
    query: DeliveryQuery = {},
  ): Promise<DeliveryPage> {
    const matching = Array.from(this.state.deliveries.values())
      .filter((record) => matches(record, triggerType, query))
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime());

    const offset = query.offset ?? 0;
    const end = query.limit === undefined ? undefined : offset + query.limit;

    return {
      count: matching.length,
      records: matching.slice(offset, end).map((record) => cloneRecord(record)),
    };
  }

  async appendMaintenanceLog(entry: MaintenanceLogEntry): Promise<void> {
    if (!this.transactionBound) {
      return this.transaction((tx) => tx.appendMaintenanceLog(entry));
    }

    this.state.logs.push({
      ...entry,
      id: randomUUID(),
      createdAt: new Date(),
    });
  }

  /** Snapshot of the maintenance log, oldest first. */
  getMaintenanceLogs(): StoredMaintenanceLog[] {
    return this.state.logs.map((entry) => cloneLog(entry));
  }

  async transaction<T>(cb: (store: IDeliveryStore) => Promise<T>): Promise<T> {
    if (this.transactionBound) {
      return cb(this);
    }

    const run = async (): Promise<T> => {
      const txState = cloneState(this.state);
      const txStore = new InMemoryDeliveryStore(this.tableName, txState, true);

      const result = await cb(txStore);
      this.state = txState;
      return result;
    };

    // Transactions run one at a time; the caller still receives the rejection.
    const next = this.tail.then(run);
    this.tail = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private openRecordOf(groupNumber: number): DeliveryRecord | undefined {
    for (const record of this.state.deliveries.values()) {
      if (record.groupNumber === groupNumber && isOpenStatus(record.status)) {
        return record;
      }
    }
    return undefined;
  }
}
