import { Inject, Injectable } from '@nestjs/common';
import {
  DeliveryPage,
  DeliveryQuery,
  TriggerType,
} from '../interfaces/delivery-records.interface';
import { IDeliveryStore } from '../interfaces/delivery-store.interface';
import {
  DEFAULT_REPORT_LIMIT,
  DELIVERY_STORE,
  MAX_REPORT_LIMIT,
} from '../monitor.constants';

function finiteOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? value : fallback;
}

@Injectable()
export class DeliveryReportService {
  constructor(
    @Inject(DELIVERY_STORE) private readonly store: IDeliveryStore,
  ) {}

  /** Manual deliveries, newest first, with the total matching count. */
  listManualDeliveries(query: DeliveryQuery = {}): Promise<DeliveryPage> {
    const limit = Math.min(
      Math.max(Math.trunc(finiteOr(query.limit, DEFAULT_REPORT_LIMIT)), 1),
      MAX_REPORT_LIMIT,
    );
    const offset = Math.max(Math.trunc(finiteOr(query.offset, 0)), 0);

    return this.store.findByTriggerType(TriggerType.MANUAL, {
      ...query,
      limit,
      offset,
    });
  }
}
