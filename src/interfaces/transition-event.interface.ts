import type { ActivityState, CoffeeType } from './register-reader.interface';

export enum TransitionKind {
  PRESS_STARTED = 'press_started',
  PRESS_COMPLETED = 'press_completed',
  READ_FAILED = 'read_failed',
  NO_CHANGE = 'no_change',
}

export interface PressStartedEvent {
  kind: TransitionKind.PRESS_STARTED;
  groupId: number;
  coffeeType?: CoffeeType;
  observedAt: Date;
}

export interface PressCompletedEvent {
  kind: TransitionKind.PRESS_COMPLETED;
  groupId: number;
  /** Coffee type seen while the group was still active */
  coffeeType?: CoffeeType;
  observedAt: Date;
  /** The group's open record was failed by a read error since its last idle read */
  afterFailedRead?: boolean;
}

export interface ReadFailedEvent {
  kind: TransitionKind.READ_FAILED;
  groupId: number;
  reason: string;
  observedAt: Date;
}

export interface NoChangeEvent {
  kind: TransitionKind.NO_CHANGE;
  groupId: number;
  state: ActivityState;
  /** True when this read only established the group's baseline */
  baseline: boolean;
  observedAt: Date;
}

export type TransitionEvent =
  | PressStartedEvent
  | PressCompletedEvent
  | ReadFailedEvent
  | NoChangeEvent;
