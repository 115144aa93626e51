import { DynamicModule, Module, Provider } from '@nestjs/common';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import {
  DeliveryMonitorModuleAsyncOptions,
  DeliveryMonitorModuleOptions,
} from './interfaces/monitor-module-options.interface';
import {
  DELIVERY_STORE,
  MONITOR_MODULE_OPTIONS,
  REGISTER_READER,
} from './monitor.constants';
import { DeliveryLifecycleTracker } from './services/delivery-lifecycle.service';
import { DeliveryReportService } from './services/delivery-report.service';
import { MonitorControlService } from './services/monitor-control.service';
import { MonitoringFlag } from './services/monitoring-flag.service';
import { PollCycleService } from './services/poll-cycle.service';
import { PollSchedulerService } from './services/poll-scheduler.service';
import { TransitionDetector } from './services/transition-detector.service';
import { validateMonitorOptions } from './utils/validate-monitor-options';

const RAW_MONITOR_OPTIONS = Symbol('RAW_MONITOR_OPTIONS');

const MONITOR_SERVICES = [
  MonitoringFlag,
  TransitionDetector,
  DeliveryLifecycleTracker,
  PollCycleService,
  MonitorControlService,
  DeliveryReportService,
  PollSchedulerService,
];

const MONITOR_EXPORTS = [
  MonitoringFlag,
  TransitionDetector,
  DeliveryLifecycleTracker,
  PollCycleService,
  MonitorControlService,
  DeliveryReportService,
  DELIVERY_STORE,
  REGISTER_READER,
  MONITOR_MODULE_OPTIONS,
];

@Module({})
export class DeliveryMonitorModule {
  static forRoot(options: DeliveryMonitorModuleOptions): DynamicModule {
    return {
      module: DeliveryMonitorModule,
      imports: [ScheduleModule.forRoot(), EventEmitterModule.forRoot()],
      providers: [
        { provide: DELIVERY_STORE, useValue: options.store },
        { provide: REGISTER_READER, useValue: options.reader },
        {
          provide: MONITOR_MODULE_OPTIONS,
          useValue: validateMonitorOptions(options),
        },
        ...MONITOR_SERVICES,
      ],
      exports: MONITOR_EXPORTS,
      global: true,
    };
  }

  static forRootAsync(options: DeliveryMonitorModuleAsyncOptions): DynamicModule {
    const providers: Provider[] = [
      {
        provide: RAW_MONITOR_OPTIONS,
        useFactory: (...args: unknown[]) => options.useFactory(...args),
        inject: options.inject ?? [],
      },
      {
        provide: DELIVERY_STORE,
        useFactory: (opts: DeliveryMonitorModuleOptions) => opts.store,
        inject: [RAW_MONITOR_OPTIONS],
      },
      {
        provide: REGISTER_READER,
        useFactory: (opts: DeliveryMonitorModuleOptions) => opts.reader,
        inject: [RAW_MONITOR_OPTIONS],
      },
      {
        provide: MONITOR_MODULE_OPTIONS,
        useFactory: (opts: DeliveryMonitorModuleOptions) =>
          validateMonitorOptions(opts),
        inject: [RAW_MONITOR_OPTIONS],
      },
      ...MONITOR_SERVICES,
    ];

    return {
      module: DeliveryMonitorModule,
      imports: [
        ScheduleModule.forRoot(),
        EventEmitterModule.forRoot(),
        ...(options.imports ?? []),
      ],
      providers,
      exports: MONITOR_EXPORTS,
      global: true,
    };
  }
}
