import {
  CreateDeliveryInput,
  DeliveryPage,
  DeliveryQuery,
  DeliveryRecord,
  MaintenanceLogEntry,
  TriggerType,
  UpdateDeliveryInput,
} from '../interfaces/delivery-records.interface';
import { IDeliveryStore } from '../interfaces/delivery-store.interface';
import { DEFAULT_TABLE_NAME } from '../monitor.constants';
import {
  assertTableName,
  buildDeliveryFilter,
  buildDeliveryUpdate,
  DELIVERY_COLUMNS,
  isDeliveryRow,
  OPEN_STATUS_SQL,
  toCount,
  toDeliveryRecord,
} from './delivery-row';

export interface PrismaRawExecutor {
  $queryRawUnsafe<T = unknown>(query: string, ...values: unknown[]): Promise<T>;
  $executeRawUnsafe(query: string, ...values: unknown[]): Promise<number>;
}

export interface PrismaTransactionRunner<TTx = PrismaRawExecutor> {
  $transaction<T>(cb: (tx: TTx) => Promise<T>): Promise<T>;
}

function hasTransactionRunner(
  executor: PrismaRawExecutor,
): executor is PrismaRawExecutor & PrismaTransactionRunner {
  return (
    '$transaction' in executor && typeof executor.$transaction === 'function'
  );
}

export class PrismaDeliveryStore implements IDeliveryStore {
  private readonly txRunner?: PrismaTransactionRunner;

  constructor(
    private readonly executor: PrismaRawExecutor,
    private readonly tableName: string = DEFAULT_TABLE_NAME,
    txRunner?: PrismaTransactionRunner,
  ) {
    assertTableName(tableName);
    assertTableName(`${tableName}_maintenance_log`);

    this.txRunner =
      txRunner ?? (hasTransactionRunner(executor) ? executor : undefined);
  }

  async findOpenRecord(
    groupNumber: number,
    lock?: boolean,
  ): Promise<DeliveryRecord | null> {
    const records = await this.queryRecords(
      `SELECT ${DELIVERY_COLUMNS} FROM ${this.tableName} WHERE group_number = $1 AND status IN (${OPEN_STATUS_SQL}) ORDER BY started_at DESC LIMIT 1${lock ? ' FOR UPDATE' : ''}`,
      groupNumber,
    );
    return records.length > 0 ? records[0] : null;
  }

  async createRecord(data: CreateDeliveryInput): Promise<DeliveryRecord> {
    const records = await this.queryRecords(
      `INSERT INTO ${this.tableName} (coffee_type, group_number, status, trigger_type, started_at, completed_at, error_message, retroactive)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING ${DELIVERY_COLUMNS}`,
      data.coffeeType,
      data.groupNumber,
      data.status,
      data.triggerType,
      data.startedAt,
      data.completedAt,
      data.errorMessage,
      data.retroactive,
    );

    if (records.length === 0) {
      throw new Error(`${this.tableName}: insert returned no row`);
    }
    return records[0];
  }

  async updateRecord(
    id: string,
    data: UpdateDeliveryInput,
  ): Promise<DeliveryRecord> {
    const update = buildDeliveryUpdate(id, data);
    if (!update.text) {
      throw new Error(`No fields to update for delivery ${id}`);
    }

    const records = await this.queryRecords(
      `UPDATE ${this.tableName} SET ${update.text} WHERE id = $1::uuid RETURNING ${DELIVERY_COLUMNS}`,
      ...update.values,
    );

    if (records.length === 0) {
      throw new Error(`${this.tableName}: delivery ${id} not found`);
    }
    return records[0];
  }

  async findByTriggerType(
    triggerType: TriggerType,
    query: DeliveryQuery = {},
  ): Promise<DeliveryPage> {
    const filter = buildDeliveryFilter(triggerType, query);

    const countRows = await this.executor.$queryRawUnsafe<unknown[]>(
      `SELECT COUNT(*)::int AS count FROM ${this.tableName} WHERE ${filter.text}`,
      ...filter.values,
    );

    const values = [...filter.values, query.limit ?? null, query.offset ?? 0];
    const records = await this.queryRecords(
      `SELECT ${DELIVERY_COLUMNS} FROM ${this.tableName} WHERE ${filter.text} ORDER BY started_at DESC LIMIT $${values.length - 1} OFFSET $${values.length}`,
      ...values,
    );

    return { count: toCount(countRows[0]), records };
  }

  async appendMaintenanceLog(entry: MaintenanceLogEntry): Promise<void> {
    await this.executor.$executeRawUnsafe(
      `INSERT INTO ${this.tableName}_maintenance_log (log_type, group_number, message, resolved)
       VALUES ($1, $2, $3, $4)`,
      entry.logType,
      entry.groupNumber,
      entry.message,
      entry.resolved,
    );
  }

  async transaction<T>(cb: (store: IDeliveryStore) => Promise<T>): Promise<T> {
    if (!this.txRunner) {
      return cb(this);
    }

    return this.txRunner.$transaction(async (tx: PrismaRawExecutor) => {
      const txStore = new PrismaDeliveryStore(tx, this.tableName);
      return cb(txStore);
    });
  }

  private async queryRecords(
    query: string,
    ...values: unknown[]
  ): Promise<DeliveryRecord[]> {
    const rows = await this.executor.$queryRawUnsafe<unknown[]>(
      query,
      ...values,
    );
    return rows.filter(isDeliveryRow).map((row) => toDeliveryRecord(row));
  }
}
