import { EventEmitter2 } from '@nestjs/event-emitter';
import { InMemoryDeliveryStore } from '../../src/adapters/in-memory-delivery.store';
import { HardwareUnavailableError } from '../../src/errors/hardware-unavailable.error';
import { MonitorEventType } from '../../src/events/monitor-event-type.enum';
import {
  DeliveryStatus,
  TriggerType,
} from '../../src/interfaces/delivery-records.interface';
import { DeliveryLifecycleTracker } from '../../src/services/delivery-lifecycle.service';
import { MonitoringFlag } from '../../src/services/monitoring-flag.service';
import { PollCycleService } from '../../src/services/poll-cycle.service';
import { TransitionDetector } from '../../src/services/transition-detector.service';
import { clockAt, ScriptedRegisterReader, ScriptStep } from '../helpers';

function setup(
  scripts: Record<number, ScriptStep[]>,
  groups: number[] = [1],
  startEnabled = true,
) {
  const reader = new ScriptedRegisterReader(scripts);
  const store = new InMemoryDeliveryStore();
  const emitter = new EventEmitter2();
  const flag = new MonitoringFlag({ startEnabled });
  const detector = new TransitionDetector(reader);
  const tracker = new DeliveryLifecycleTracker(store, emitter);
  const pollCycle = new PollCycleService(flag, detector, tracker, emitter, {
    groups,
  });
  return { reader, store, emitter, flag, detector, pollCycle };
}

async function manualRecords(store: InMemoryDeliveryStore) {
  return (await store.findByTriggerType(TriggerType.MANUAL)).records;
}

describe('PollCycleService', () => {
  it('should not read anything while monitoring is disabled', async () => {
    const { reader, pollCycle } = setup({ 1: ['active'] }, [1], false);

    const result = await pollCycle.runCycle();

    expect(result.status).toBe('disabled');
    expect(result.groupsScanned).toBe(0);
    expect(reader.reads).toEqual([]);
  });

  it('should only record baselines on the first cycle', async () => {
    const { store, pollCycle } = setup({ 1: ['active'], 2: ['idle'] }, [1, 2]);

    const result = await pollCycle.runCycle();

    expect(result.status).toBe('completed');
    expect(result.groupsScanned).toBe(2);
    expect(result.activities).toEqual([]);
    expect(result.activeGroups).toEqual([1]);
    expect(await manualRecords(store)).toEqual([]);
  });

  it('should record one delivery for idle, active, active, idle', async () => {
    const { store, pollCycle } = setup({
      1: [
        'idle',
        { state: 'active', coffeeType: 'double_medium' },
        { state: 'active', coffeeType: 'double_medium' },
        'idle',
      ],
    });

    await pollCycle.runCycle();
    const second = await pollCycle.runCycle();
    const third = await pollCycle.runCycle();
    const fourth = await pollCycle.runCycle();

    expect(second.activities).toEqual([
      {
        type: 'delivery_started',
        group: 1,
        coffeeType: 'double_medium',
        deliveryId: expect.any(String),
      },
    ]);
    expect(third.activities).toEqual([]);
    expect(fourth.activities).toEqual([
      {
        type: 'delivery_completed',
        group: 1,
        coffeeType: 'double_medium',
        deliveryId: second.activities[0].deliveryId,
        retroactive: false,
      },
    ]);

    const records = await manualRecords(store);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      groupNumber: 1,
      coffeeType: 'double_medium',
      triggerType: TriggerType.MANUAL,
      status: DeliveryStatus.COMPLETED,
      startedAt: clockAt(2),
      completedAt: clockAt(4),
      retroactive: false,
    });
  });

  it('should skip a cycle that starts while another is running', async () => {
    const { reader, pollCycle } = setup({ 1: ['idle'] });

    const first = pollCycle.runCycle();
    const second = pollCycle.runCycle();

    expect(pollCycle.isRunning()).toBe(true);
    await expect(second).resolves.toMatchObject({
      status: 'skipped',
      groupsScanned: 0,
    });
    await expect(first).resolves.toMatchObject({ status: 'completed' });
    expect(reader.reads).toEqual([1]);
    expect(pollCycle.isRunning()).toBe(false);
  });

  it('should fail the open delivery on a read failure and re-baseline afterwards', async () => {
    const { store, pollCycle } = setup({
      1: [
        'idle',
        'active',
        new HardwareUnavailableError(1, 'machine not connected'),
        'idle',
      ],
    });

    await pollCycle.runCycle();
    await pollCycle.runCycle();
    const failedCycle = await pollCycle.runCycle();
    const recovered = await pollCycle.runCycle();

    expect(failedCycle.activities).toEqual([
      {
        type: 'delivery_failed',
        group: 1,
        coffeeType: 'single_short',
        deliveryId: expect.any(String),
        message: 'hardware unavailable',
      },
    ]);
    expect(recovered.activities).toEqual([]);

    const records = await manualRecords(store);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      status: DeliveryStatus.FAILED,
      errorMessage: 'hardware unavailable',
      completedAt: null,
    });
  });

  it('should keep one failed record when the group recovers while still active', async () => {
    const { store, pollCycle } = setup({
      1: [
        'idle',
        'active',
        new HardwareUnavailableError(1, 'machine not connected'),
        'active',
        'idle',
        { state: 'active', coffeeType: 'double_short' },
        'idle',
      ],
    });

    await pollCycle.runCycle();
    await pollCycle.runCycle();
    await pollCycle.runCycle();
    const recoveredActive = await pollCycle.runCycle();
    const recoveredIdle = await pollCycle.runCycle();

    expect(recoveredActive.activities).toEqual([]);
    expect(recoveredActive.activeGroups).toEqual([1]);
    expect(recoveredIdle.activities).toEqual([]);
    expect(recoveredIdle.warnings).toEqual([]);

    const afterFailure = await manualRecords(store);
    expect(afterFailure).toHaveLength(1);
    expect(afterFailure[0]).toMatchObject({
      status: DeliveryStatus.FAILED,
      retroactive: false,
      startedAt: clockAt(2),
    });

    const nextStart = await pollCycle.runCycle();
    await pollCycle.runCycle();

    expect(nextStart.activities).toEqual([
      {
        type: 'delivery_started',
        group: 1,
        coffeeType: 'double_short',
        deliveryId: expect.any(String),
      },
    ]);
    const records = await manualRecords(store);
    expect(records.map((r) => [r.status, r.retroactive])).toEqual([
      [DeliveryStatus.COMPLETED, false],
      [DeliveryStatus.FAILED, false],
    ]);
    expect(records[0]).toMatchObject({
      coffeeType: 'double_short',
      startedAt: clockAt(6),
      completedAt: clockAt(7),
    });
  });

  it('should report a read failure without an open delivery and keep scanning other groups', async () => {
    const failure = new HardwareUnavailableError(1, 'machine not connected');
    const { store, pollCycle } = setup(
      { 1: [failure], 2: ['idle', 'active'] },
      [1, 2],
    );

    await pollCycle.runCycle();
    const result = await pollCycle.runCycle();

    expect(result.activities).toEqual([
      {
        type: 'read_failed',
        group: 1,
        message: 'Group 1 status could not be read: machine not connected',
      },
      {
        type: 'delivery_started',
        group: 2,
        coffeeType: 'single_short',
        deliveryId: expect.any(String),
      },
    ]);
    expect(result.warnings).toEqual([]);
    expect((await manualRecords(store)).map((r) => r.groupNumber)).toEqual([2]);
  });

  it('should turn a store write failure into a warning without retrying', async () => {
    const { store, pollCycle } = setup({ 1: ['idle', 'active', 'active'] });
    jest
      .spyOn(store, 'transaction')
      .mockRejectedValueOnce(new Error('disk full'));

    await pollCycle.runCycle();
    const failed = await pollCycle.runCycle();
    const next = await pollCycle.runCycle();

    expect(failed.activities).toEqual([]);
    expect(failed.warnings).toEqual([
      {
        group: 1,
        error: 'Delivery record write for group 1 failed: disk full',
      },
    ]);
    expect(next.activities).toEqual([]);
    expect(next.warnings).toEqual([]);
    expect(await manualRecords(store)).toEqual([]);
  });

  it('should re-baseline after monitoring is re-enabled', async () => {
    const { store, flag, pollCycle } = setup({
      1: ['idle', { state: 'active', coffeeType: 'single_long' }, 'idle'],
    });

    await pollCycle.runCycle();
    flag.disable();
    expect((await pollCycle.runCycle()).status).toBe('disabled');
    flag.enable();

    const rebaselined = await pollCycle.runCycle();
    const completed = await pollCycle.runCycle();

    expect(rebaselined.activities).toEqual([]);
    expect(completed.activities).toEqual([
      {
        type: 'delivery_completed',
        group: 1,
        coffeeType: 'single_long',
        deliveryId: expect.any(String),
        retroactive: true,
      },
    ]);

    const records = await manualRecords(store);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      status: DeliveryStatus.COMPLETED,
      retroactive: true,
      startedAt: clockAt(3),
      completedAt: clockAt(3),
    });
  });

  it('should emit a cycle summary and keep it as the last cycle', async () => {
    const { emitter, pollCycle } = setup({ 1: ['idle', 'active'] });
    const listener = jest.fn();
    emitter.on(MonitorEventType.CYCLE_COMPLETED, listener);

    expect(pollCycle.getLastCycle()).toBeNull();
    await pollCycle.runCycle();
    const result = await pollCycle.runCycle();

    expect(pollCycle.getLastCycle()).toBe(result);
    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener).toHaveBeenLastCalledWith({
      activityCount: 1,
      warningCount: 0,
      groupsScanned: 1,
      durationMs: result.durationMs,
      timestamp: result.finishedAt,
    });
  });
});
