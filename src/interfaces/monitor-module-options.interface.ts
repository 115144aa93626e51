import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { IDeliveryStore } from './delivery-store.interface';
import { IRegisterReader } from './register-reader.interface';

export interface DeliveryMonitorModuleOptions {
  /** Record store implementing IDeliveryStore */
  store: IDeliveryStore;
  /** Hardware register reader */
  reader: IRegisterReader;

  /** Group numbers to poll. Default: [1, 2, 3] */
  groups?: number[];

  /** Cadence of the poll cycle in milliseconds. Default: 2000 */
  pollIntervalMs?: number;

  /** Register the internal poll interval. Default: true */
  enablePolling?: boolean;

  /** Initial state of the monitoring flag. Default: false */
  startEnabled?: boolean;
}

export interface ResolvedMonitorOptions {
  groups: number[];
  pollIntervalMs: number;
  enablePolling: boolean;
  startEnabled: boolean;
}

export interface DeliveryMonitorModuleAsyncOptions {
  imports?: ModuleMetadata['imports'];
  useFactory(
    ...args: unknown[]
  ): Promise<DeliveryMonitorModuleOptions> | DeliveryMonitorModuleOptions;
  inject?: FactoryProvider['inject'];
}
