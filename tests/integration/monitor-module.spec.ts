import { Module } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { Test, TestingModule } from '@nestjs/testing';
import { InMemoryDeliveryStore } from '../../src/adapters/in-memory-delivery.store';
import { TriggerType } from '../../src/interfaces/delivery-records.interface';
import {
  DELIVERY_STORE,
  MONITOR_MODULE_OPTIONS,
  POLL_INTERVAL_NAME,
} from '../../src/monitor.constants';
import { DeliveryMonitorModule } from '../../src/monitor.module';
import { DeliveryReportService } from '../../src/services/delivery-report.service';
import { MonitorControlService } from '../../src/services/monitor-control.service';
import { PollCycleService } from '../../src/services/poll-cycle.service';
import { ScriptedRegisterReader } from '../helpers';

const MONITOR_SETTINGS = 'MONITOR_SETTINGS';

interface MonitorSettings {
  groups: number[];
}

@Module({
  providers: [
    {
      provide: MONITOR_SETTINGS,
      useValue: { groups: [4, 2] } satisfies MonitorSettings,
    },
  ],
  exports: [MONITOR_SETTINGS],
})
class SettingsModule {}

describe('DeliveryMonitorModule integration', () => {
  let module: TestingModule | undefined;

  afterEach(async () => {
    if (module) {
      await module.close();
      module = undefined;
    }
  });

  it('should wire the monitor with forRoot', async () => {
    const store = new InMemoryDeliveryStore();
    module = await Test.createTestingModule({
      imports: [
        DeliveryMonitorModule.forRoot({
          store,
          reader: new ScriptedRegisterReader({ 1: ['idle', 'active'] }),
          groups: [1],
          enablePolling: false,
        }),
      ],
    }).compile();
    await module.init();

    const control = module.get(MonitorControlService);
    const pollCycle = module.get(PollCycleService);
    const report = module.get(DeliveryReportService);

    expect(module.get(DELIVERY_STORE)).toBe(store);
    expect((await pollCycle.runCycle()).status).toBe('disabled');

    await control.startMonitoring();
    await pollCycle.runCycle();
    await pollCycle.runCycle();

    const page = await report.listManualDeliveries();
    expect(page.count).toBe(1);
    expect(page.records[0]).toMatchObject({
      groupNumber: 1,
      triggerType: TriggerType.MANUAL,
    });
    expect(store.getMaintenanceLogs().map((log) => log.logType)).toEqual([
      'health_check',
      'manual_delivery',
    ]);
  });

  it('should resolve options with forRootAsync', async () => {
    module = await Test.createTestingModule({
      imports: [
        DeliveryMonitorModule.forRootAsync({
          imports: [SettingsModule],
          inject: [MONITOR_SETTINGS],
          useFactory: (settings: MonitorSettings) => ({
            store: new InMemoryDeliveryStore(),
            reader: new ScriptedRegisterReader(),
            groups: settings.groups,
            enablePolling: false,
            startEnabled: true,
          }),
        }),
      ],
    }).compile();
    await module.init();

    expect(module.get(MONITOR_MODULE_OPTIONS)).toEqual({
      groups: [2, 4],
      pollIntervalMs: 2000,
      enablePolling: false,
      startEnabled: true,
    });
    expect(module.get(MonitorControlService).getStatus()).toMatchObject({
      enabled: true,
      knownGroups: [2, 4],
    });
  });

  it('should register the poll interval and remove it on close', async () => {
    module = await Test.createTestingModule({
      imports: [
        DeliveryMonitorModule.forRoot({
          store: new InMemoryDeliveryStore(),
          reader: new ScriptedRegisterReader(),
          pollIntervalMs: 60_000,
        }),
      ],
    }).compile();
    await module.init();

    const schedulerRegistry = module.get(SchedulerRegistry);
    expect(schedulerRegistry.doesExist('interval', POLL_INTERVAL_NAME)).toBe(
      true,
    );

    await module.close();
    module = undefined;
    expect(schedulerRegistry.doesExist('interval', POLL_INTERVAL_NAME)).toBe(
      false,
    );
  });

  it('should reject invalid options', () => {
    expect(() =>
      DeliveryMonitorModule.forRoot({
        store: new InMemoryDeliveryStore(),
        reader: new ScriptedRegisterReader(),
        groups: [1, 7],
      }),
    ).toThrow(
      'Invalid delivery monitor options: group 7 is not an integer between 1 and 4',
    );
  });
});
