import { sql, SQL } from 'drizzle-orm';
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
  DELIVERY_COLUMNS,
  extractRows,
  isDeliveryRow,
  OPEN_STATUS_SQL,
  toCount,
  toDeliveryRecord,
} from './delivery-row';

/**
 * The part of a Drizzle Postgres database (or transaction) the store uses.
 * Both `PgDatabase` and `PgTransaction` satisfy it.
 */
export interface DrizzleSqlExecutor {
  execute(query: SQL): PromiseLike<unknown>;
  transaction<T>(cb: (tx: DrizzleSqlExecutor) => Promise<T>): Promise<T>;
}

function toRecords(result: unknown): DeliveryRecord[] {
  return extractRows(result)
    .filter(isDeliveryRow)
    .map((row) => toDeliveryRecord(row));
}

export class DrizzleDeliveryStore implements IDeliveryStore {
  constructor(
    private readonly db: DrizzleSqlExecutor,
    private readonly tableName: string = DEFAULT_TABLE_NAME,
    private readonly inTransaction = false,
  ) {
    assertTableName(tableName);
    assertTableName(this.logTableName);
  }

  async findOpenRecord(
    groupNumber: number,
    lock?: boolean,
  ): Promise<DeliveryRecord | null> {
    const lockClause = lock ? sql` FOR UPDATE` : sql``;
    const result = await this.db.execute(
      sql`SELECT ${sql.raw(DELIVERY_COLUMNS)} FROM ${sql.raw(this.tableName)} WHERE group_number = ${groupNumber} AND status IN (${sql.raw(OPEN_STATUS_SQL)}) ORDER BY started_at DESC LIMIT 1${lockClause}`,
    );

    const records = toRecords(result);
    return records.length > 0 ? records[0] : null;
  }

  async createRecord(data: CreateDeliveryInput): Promise<DeliveryRecord> {
    const result = await this.db.execute(
      sql`INSERT INTO ${sql.raw(this.tableName)} (coffee_type, group_number, status, trigger_type, started_at, completed_at, error_message, retroactive)
          VALUES (${data.coffeeType}, ${data.groupNumber}, ${data.status}, ${data.triggerType}, ${data.startedAt}, ${data.completedAt}, ${data.errorMessage}, ${data.retroactive})
          RETURNING ${sql.raw(DELIVERY_COLUMNS)}`,
    );

    const records = toRecords(result);
    if (records.length === 0) {
      throw new Error(`${this.tableName}: insert returned no row`);
    }
    return records[0];
  }

  async updateRecord(
    id: string,
    data: UpdateDeliveryInput,
  ): Promise<DeliveryRecord> {
    const assignments: SQL[] = [];
    if (data.coffeeType !== undefined) {
      assignments.push(sql`coffee_type = ${data.coffeeType}`);
    }
    if (data.status !== undefined) {
      assignments.push(sql`status = ${data.status}`);
    }
    if (data.completedAt !== undefined) {
      assignments.push(sql`completed_at = ${data.completedAt}`);
    }
    if (data.errorMessage !== undefined) {
      assignments.push(sql`error_message = ${data.errorMessage}`);
    }
    if (assignments.length === 0) {
      throw new Error(`No fields to update for delivery ${id}`);
    }

    const result = await this.db.execute(
      sql`UPDATE ${sql.raw(this.tableName)} SET ${sql.join(assignments, sql`, `)} WHERE id = ${id} RETURNING ${sql.raw(DELIVERY_COLUMNS)}`,
    );

    const records = toRecords(result);
    if (records.length === 0) {
      throw new Error(`${this.tableName}: delivery ${id} not found`);
    }
    return records[0];
  }

  async findByTriggerType(
    triggerType: TriggerType,
    query: DeliveryQuery = {},
  ): Promise<DeliveryPage> {
    const conditions: SQL[] = [sql`trigger_type = ${triggerType}`];
    if (query.groupNumber !== undefined) {
      conditions.push(sql`group_number = ${query.groupNumber}`);
    }
    if (query.status !== undefined) {
      conditions.push(sql`status = ${query.status}`);
    }
    if (query.since !== undefined) {
      conditions.push(sql`started_at >= ${query.since}`);
    }
    if (query.until !== undefined) {
      conditions.push(sql`started_at < ${query.until}`);
    }
    const where = sql.join(conditions, sql` AND `);

    const countResult = await this.db.execute(
      sql`SELECT COUNT(*)::int AS count FROM ${sql.raw(this.tableName)} WHERE ${where}`,
    );
    const result = await this.db.execute(
      sql`SELECT ${sql.raw(DELIVERY_COLUMNS)} FROM ${sql.raw(this.tableName)} WHERE ${where} ORDER BY started_at DESC LIMIT ${query.limit ?? null} OFFSET ${query.offset ?? 0}`,
    );

    return {
      count: toCount(extractRows(countResult)[0]),
      records: toRecords(result),
    };
  }

  async appendMaintenanceLog(entry: MaintenanceLogEntry): Promise<void> {
    await this.db.execute(
      sql`INSERT INTO ${sql.raw(this.logTableName)} (log_type, group_number, message, resolved)
          VALUES (${entry.logType}, ${entry.groupNumber}, ${entry.message}, ${entry.resolved})`,
    );
  }

  async transaction<T>(cb: (store: IDeliveryStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      return cb(this);
    }

    return this.db.transaction(async (tx) => {
      const txStore = new DrizzleDeliveryStore(tx, this.tableName, true);
      return cb(txStore);
    });
  }

  private get logTableName(): string {
    return `${this.tableName}_maintenance_log`;
  }
}
