import {
  CreateDeliveryInput,
  DeliveryPage,
  DeliveryQuery,
  DeliveryRecord,
  MaintenanceLogEntry,
  TriggerType,
  UpdateDeliveryInput,
} from './delivery-records.interface';

export interface IDeliveryStore {
  /**
   * Find the open (started or in_progress) record of a group.
   * @param lock - If true, use SELECT ... FOR UPDATE
   */
  findOpenRecord(
    groupNumber: number,
    lock?: boolean,
  ): Promise<DeliveryRecord | null>;

  /**
   * Insert a delivery record.
   * Rejects when the record is open and the group already has an open record.
   */
  createRecord(data: CreateDeliveryInput): Promise<DeliveryRecord>;

  /**
   * Update the given fields of a record and return the stored row.
   * Rejects when no record has this id.
   */
  updateRecord(id: string, data: UpdateDeliveryInput): Promise<DeliveryRecord>;

  /**
   * Read-only reporting query, newest first.
   */
  findByTriggerType(
    triggerType: TriggerType,
    query?: DeliveryQuery,
  ): Promise<DeliveryPage>;

  appendMaintenanceLog(entry: MaintenanceLogEntry): Promise<void>;

  /**
   * Execute a callback within a database transaction.
   * The callback receives a store instance bound to the transaction.
   */
  transaction<T>(cb: (store: IDeliveryStore) => Promise<T>): Promise<T>;
}
