import { EventEmitter2 } from '@nestjs/event-emitter';
import { SchedulerRegistry } from '@nestjs/schedule';
import { InMemoryDeliveryStore } from '../../src/adapters/in-memory-delivery.store';
import { POLL_INTERVAL_NAME } from '../../src/monitor.constants';
import { DeliveryLifecycleTracker } from '../../src/services/delivery-lifecycle.service';
import { MonitoringFlag } from '../../src/services/monitoring-flag.service';
import { PollCycleService } from '../../src/services/poll-cycle.service';
import { PollSchedulerService } from '../../src/services/poll-scheduler.service';
import { TransitionDetector } from '../../src/services/transition-detector.service';
import { ScriptedRegisterReader } from '../helpers';

describe('PollSchedulerService', () => {
  let schedulerRegistry: SchedulerRegistry;
  let pollCycle: PollCycleService;

  beforeEach(() => {
    jest.useFakeTimers();
    const emitter = new EventEmitter2();
    schedulerRegistry = new SchedulerRegistry();
    pollCycle = new PollCycleService(
      new MonitoringFlag({ startEnabled: true }),
      new TransitionDetector(new ScriptedRegisterReader({ 1: ['idle'] })),
      new DeliveryLifecycleTracker(new InMemoryDeliveryStore(), emitter),
      emitter,
      { groups: [1] },
    );
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should run a cycle on every interval tick until destroyed', async () => {
    const runCycle = jest.spyOn(pollCycle, 'runCycle');
    const scheduler = new PollSchedulerService(pollCycle, schedulerRegistry, {
      pollIntervalMs: 1000,
      enablePolling: true,
    });

    scheduler.onModuleInit();
    expect(schedulerRegistry.doesExist('interval', POLL_INTERVAL_NAME)).toBe(
      true,
    );

    await jest.advanceTimersByTimeAsync(3000);
    expect(runCycle).toHaveBeenCalledTimes(3);

    scheduler.onModuleDestroy();
    expect(schedulerRegistry.doesExist('interval', POLL_INTERVAL_NAME)).toBe(
      false,
    );

    await jest.advanceTimersByTimeAsync(3000);
    expect(runCycle).toHaveBeenCalledTimes(3);
  });

  it('should not register an interval when polling is disabled', () => {
    const addInterval = jest.spyOn(schedulerRegistry, 'addInterval');
    const scheduler = new PollSchedulerService(pollCycle, schedulerRegistry, {
      pollIntervalMs: 1000,
      enablePolling: false,
    });

    scheduler.onModuleInit();
    scheduler.onModuleDestroy();

    expect(addInterval).not.toHaveBeenCalled();
    expect(schedulerRegistry.doesExist('interval', POLL_INTERVAL_NAME)).toBe(
      false,
    );
  });

  it('should keep ticking after a cycle rejects', async () => {
    const runCycle = jest
      .spyOn(pollCycle, 'runCycle')
      .mockRejectedValueOnce(new Error('boom'));
    const scheduler = new PollSchedulerService(pollCycle, schedulerRegistry, {
      pollIntervalMs: 500,
      enablePolling: true,
    });

    scheduler.onModuleInit();
    await jest.advanceTimersByTimeAsync(1000);
    scheduler.onModuleDestroy();

    expect(runCycle).toHaveBeenCalledTimes(2);
  });
});
