import { IDeliveryStore } from '../src/interfaces/delivery-store.interface';
import {
  DeliveryRecord,
  DeliveryStatus,
  TriggerType,
} from '../src/interfaces/delivery-records.interface';
import {
  ActivityState,
  CoffeeType,
  IRegisterReader,
  RegisterSnapshot,
} from '../src/interfaces/register-reader.interface';

export function createMockStore(): jest.Mocked<IDeliveryStore> {
  const mockStore: jest.Mocked<IDeliveryStore> = {
    findOpenRecord: jest.fn().mockResolvedValue(null),
    createRecord: jest.fn(),
    updateRecord: jest.fn(),
    findByTriggerType: jest.fn().mockResolvedValue({ count: 0, records: [] }),
    appendMaintenanceLog: jest.fn().mockResolvedValue(undefined),
    transaction: jest.fn().mockImplementation(async (cb) => cb(mockStore)),
  };
  return mockStore;
}

export function makeRecord(
  overrides: Partial<DeliveryRecord> = {},
): DeliveryRecord {
  return {
    id: 'delivery-1',
    coffeeType: 'single_short',
    groupNumber: 1,
    status: DeliveryStatus.STARTED,
    triggerType: TriggerType.MANUAL,
    startedAt: new Date('2025-01-01T08:00:00.000Z'),
    completedAt: null,
    errorMessage: null,
    retroactive: false,
    ...overrides,
  };
}

export type ScriptStep =
  | ActivityState
  | { state: ActivityState; coffeeType?: CoffeeType }
  | Error;

/**
 * Register reader that plays back a fixed sequence of readings per group.
 * The last step repeats once the script runs out. Each read advances a
 * shared clock by one second, starting at 2025-01-01T08:00:00Z.
 */
export class ScriptedRegisterReader implements IRegisterReader {
  private readonly scripts = new Map<number, ScriptStep[]>();
  private readonly positions = new Map<number, number>();
  private tick = 0;
  readonly reads: number[] = [];

  constructor(scripts: Record<number, ScriptStep[]> = {}) {
    for (const [group, steps] of Object.entries(scripts)) {
      this.scripts.set(Number(group), steps);
    }
  }

  async read(groupId: number): Promise<RegisterSnapshot> {
    this.reads.push(groupId);
    const steps = this.scripts.get(groupId) ?? ['idle'];
    const position = this.positions.get(groupId) ?? 0;
    const step = steps[Math.min(position, steps.length - 1)] ?? 'idle';
    this.positions.set(groupId, position + 1);
    this.tick++;

    if (step instanceof Error) {
      throw step;
    }

    const reading: { state: ActivityState; coffeeType?: CoffeeType } =
      typeof step === 'string' ? { state: step } : step;
    return {
      groupId,
      activityState: reading.state,
      coffeeTypeHint:
        reading.state === 'active'
          ? (reading.coffeeType ?? 'single_short')
          : undefined,
      timestamp: clockAt(this.tick),
    };
  }
}

/** Timestamp the scripted reader stamps on its n-th read (1-based). */
export function clockAt(tick: number): Date {
  return new Date(Date.UTC(2025, 0, 1, 8, 0, tick));
}
