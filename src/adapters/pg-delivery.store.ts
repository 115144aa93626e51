import type { Pool, PoolClient } from 'pg';
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
  CountRow,
  DELIVERY_COLUMNS,
  DeliveryRow,
  OPEN_STATUS_SQL,
  toCount,
  toDeliveryRecord,
} from './delivery-row';

type PgQueryable = Pick<Pool, 'query'> | Pick<PoolClient, 'query'>;

export class PgDeliveryStore implements IDeliveryStore {
  constructor(
    private readonly pool: Pool,
    private readonly tableName: string = DEFAULT_TABLE_NAME,
    private readonly client?: PoolClient,
  ) {
    assertTableName(tableName);
    assertTableName(`${tableName}_maintenance_log`);
  }

  async findOpenRecord(
    groupNumber: number,
    lock?: boolean,
  ): Promise<DeliveryRecord | null> {
    const conn = this.getConn();
    const lockClause = lock ? ' FOR UPDATE' : '';

    const result = await conn.query<DeliveryRow>(
      `SELECT ${DELIVERY_COLUMNS}
       FROM ${this.tableName}
       WHERE group_number = $1 AND status IN (${OPEN_STATUS_SQL})
       ORDER BY started_at DESC
       LIMIT 1${lockClause}`,
      [groupNumber],
    );

    if (result.rows.length === 0) return null;
    return toDeliveryRecord(result.rows[0]);
  }

  async createRecord(data: CreateDeliveryInput): Promise<DeliveryRecord> {
    const conn = this.getConn();
    const result = await conn.query<DeliveryRow>(
      `INSERT INTO ${this.tableName}
       (coffee_type, group_number, status, trigger_type, started_at, completed_at, error_message, retroactive)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING ${DELIVERY_COLUMNS}`,
      [
        data.coffeeType,
        data.groupNumber,
        data.status,
        data.triggerType,
        data.startedAt,
        data.completedAt,
        data.errorMessage,
        data.retroactive,
      ],
    );

    return toDeliveryRecord(result.rows[0]);
  }

  async updateRecord(
    id: string,
    data: UpdateDeliveryInput,
  ): Promise<DeliveryRecord> {
    const update = buildDeliveryUpdate(id, data);
    if (!update.text) {
      throw new Error(`No fields to update for delivery ${id}`);
    }

    const conn = this.getConn();
    const result = await conn.query<DeliveryRow>(
      `UPDATE ${this.tableName}
       SET ${update.text}
       WHERE id = $1::uuid
       RETURNING ${DELIVERY_COLUMNS}`,
      update.values,
    );

    if (result.rows.length === 0) {
      throw new Error(`${this.tableName}: delivery ${id} not found`);
    }
    return toDeliveryRecord(result.rows[0]);
  }

  async findByTriggerType(
    triggerType: TriggerType,
    query: DeliveryQuery = {},
  ): Promise<DeliveryPage> {
    const conn = this.getConn();
    const filter = buildDeliveryFilter(triggerType, query);

    const countResult = await conn.query<CountRow>(
      `SELECT COUNT(*)::int AS count FROM ${this.tableName} WHERE ${filter.text}`,
      filter.values,
    );

    const values = [...filter.values, query.limit ?? null, query.offset ?? 0];
    const result = await conn.query<DeliveryRow>(
      `SELECT ${DELIVERY_COLUMNS}
       FROM ${this.tableName}
       WHERE ${filter.text}
       ORDER BY started_at DESC
       LIMIT $${values.length - 1} OFFSET $${values.length}`,
      values,
    );

    return {
      count: toCount(countResult.rows[0]),
      records: result.rows.map((row) => toDeliveryRecord(row)),
    };
  }

  async appendMaintenanceLog(entry: MaintenanceLogEntry): Promise<void> {
    const conn = this.getConn();
    await conn.query(
      `INSERT INTO ${this.tableName}_maintenance_log
       (log_type, group_number, message, resolved)
       VALUES ($1, $2, $3, $4)`,
      [entry.logType, entry.groupNumber, entry.message, entry.resolved],
    );
  }

  async transaction<T>(cb: (store: IDeliveryStore) => Promise<T>): Promise<T> {
    if (this.client) {
      return cb(this);
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const txStore = new PgDeliveryStore(this.pool, this.tableName, client);
      const result = await cb(txStore);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private getConn(): PgQueryable {
    return this.client ?? this.pool;
  }
}
