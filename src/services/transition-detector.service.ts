import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  IRegisterReader,
  RegisterSnapshot,
} from '../interfaces/register-reader.interface';
import {
  TransitionEvent,
  TransitionKind,
} from '../interfaces/transition-event.interface';
import { REGISTER_READER } from '../monitor.constants';

/**
 * Holds the last successful snapshot of every group and turns each new read
 * into one transition event.
 *
 * A group with no stored snapshot only records a baseline: the first read
 * after monitoring starts never reports a press.
 */
@Injectable()
export class TransitionDetector {
  private readonly logger = new Logger(TransitionDetector.name);
  private readonly lastSnapshots = new Map<number, RegisterSnapshot>();

  constructor(
    @Inject(REGISTER_READER) private readonly reader: IRegisterReader,
  ) {}

  async detect(groupId: number): Promise<TransitionEvent> {
    let current: RegisterSnapshot;
    try {
      current = await this.reader.read(groupId);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Group ${groupId} read failed: ${reason}`);
      // last snapshot is kept so the next good read still sees a real change
      return {
        kind: TransitionKind.READ_FAILED,
        groupId,
        reason,
        observedAt: new Date(),
      };
    }

    const last = this.lastSnapshots.get(groupId);
    this.lastSnapshots.set(groupId, current);

    if (!last) {
      return {
        kind: TransitionKind.NO_CHANGE,
        groupId,
        state: current.activityState,
        baseline: true,
        observedAt: current.timestamp,
      };
    }

    if (last.activityState === 'idle' && current.activityState === 'active') {
      return {
        kind: TransitionKind.PRESS_STARTED,
        groupId,
        coffeeType: current.coffeeTypeHint,
        observedAt: current.timestamp,
      };
    }

    if (last.activityState === 'active' && current.activityState === 'idle') {
      return {
        kind: TransitionKind.PRESS_COMPLETED,
        groupId,
        coffeeType: last.coffeeTypeHint,
        observedAt: current.timestamp,
      };
    }

    return {
      kind: TransitionKind.NO_CHANGE,
      groupId,
      state: current.activityState,
      baseline: false,
      observedAt: current.timestamp,
    };
  }

  getLastSnapshot(groupId: number): RegisterSnapshot | undefined {
    return this.lastSnapshots.get(groupId);
  }

  /** Drop one group's baseline; its next read starts fresh. */
  forget(groupId: number): void {
    this.lastSnapshots.delete(groupId);
  }

  reset(): void {
    this.lastSnapshots.clear();
  }
}
