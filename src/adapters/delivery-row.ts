import {
  DeliveryQuery,
  DeliveryRecord,
  isDeliveryStatus,
  isTriggerType,
  OPEN_DELIVERY_STATUSES,
  TriggerType,
  UpdateDeliveryInput,
} from '../interfaces/delivery-records.interface';

export const TABLE_NAME_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export const DELIVERY_COLUMNS =
  'id, coffee_type, group_number, status, trigger_type, started_at, completed_at, error_message, retroactive';

export const OPEN_STATUS_SQL = OPEN_DELIVERY_STATUSES.map((s) => `'${s}'`).join(
  ', ',
);

export interface DeliveryRow {
  id: string;
  coffee_type: string;
  group_number: number | string;
  status: string;
  trigger_type: string;
  started_at: Date | string;
  completed_at: Date | string | null;
  error_message: string | null;
  retroactive: boolean;
}

export interface CountRow {
  count: number | string | bigint;
}

export function assertTableName(tableName: string): void {
  if (!TABLE_NAME_REGEX.test(tableName)) {
    throw new Error(
      `Invalid table name "${tableName}". Only alphanumeric characters and underscores are allowed.`,
    );
  }
}

export function isDeliveryRow(value: unknown): value is DeliveryRow {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'id' in value &&
    'coffee_type' in value &&
    'group_number' in value &&
    'status' in value &&
    'trigger_type' in value &&
    'started_at' in value
  );
}

export function isCountRow(value: unknown): value is CountRow {
  return typeof value === 'object' && value !== null && 'count' in value;
}

/**
 * Extracts the row array from a driver result.
 * postgres-js returns the array itself, node-postgres returns { rows: [...] }.
 */
export function extractRows(result: unknown): unknown[] {
  if (Array.isArray(result)) return result;
  if (
    typeof result === 'object' &&
    result !== null &&
    'rows' in result &&
    Array.isArray(result.rows)
  ) {
    return result.rows;
  }
  return [];
}

export function toDeliveryRecord(row: DeliveryRow): DeliveryRecord {
  if (!isDeliveryStatus(row.status)) {
    throw new Error(`Delivery ${row.id} has unknown status "${row.status}"`);
  }
  if (!isTriggerType(row.trigger_type)) {
    throw new Error(
      `Delivery ${row.id} has unknown trigger type "${row.trigger_type}"`,
    );
  }

  return {
    id: String(row.id),
    coffeeType: row.coffee_type,
    groupNumber: Number(row.group_number),
    status: row.status,
    triggerType: row.trigger_type,
    startedAt: new Date(row.started_at),
    completedAt: row.completed_at ? new Date(row.completed_at) : null,
    errorMessage: row.error_message ?? null,
    retroactive: Boolean(row.retroactive),
  };
}

export function toCount(row: unknown): number {
  return isCountRow(row) ? Number(row.count) : 0;
}

export interface ParameterizedSql {
  text: string;
  values: unknown[];
}

/**
 * WHERE clause of a reporting query, using $n placeholders from 1.
 */
export function buildDeliveryFilter(
  triggerType: TriggerType,
  query: DeliveryQuery,
): ParameterizedSql {
  const values: unknown[] = [triggerType];
  const conditions = ['trigger_type = $1'];

  if (query.groupNumber !== undefined) {
    values.push(query.groupNumber);
    conditions.push(`group_number = $${values.length}`);
  }
  if (query.status !== undefined) {
    values.push(query.status);
    conditions.push(`status = $${values.length}`);
  }
  if (query.since !== undefined) {
    values.push(query.since);
    conditions.push(`started_at >= $${values.length}`);
  }
  if (query.until !== undefined) {
    values.push(query.until);
    conditions.push(`started_at < $${values.length}`);
  }

  return { text: conditions.join(' AND '), values };
}

/**
 * SET clause of an update. `values` starts with the record id as $1.
 */
export function buildDeliveryUpdate(
  id: string,
  data: UpdateDeliveryInput,
): ParameterizedSql {
  const values: unknown[] = [id];
  const assignments: string[] = [];

  const columns: Array<[keyof UpdateDeliveryInput, string]> = [
    ['coffeeType', 'coffee_type'],
    ['status', 'status'],
    ['completedAt', 'completed_at'],
    ['errorMessage', 'error_message'],
  ];

  for (const [key, column] of columns) {
    if (data[key] === undefined) continue;
    values.push(data[key]);
    assignments.push(`${column} = $${values.length}`);
  }

  return { text: assignments.join(', '), values };
}
