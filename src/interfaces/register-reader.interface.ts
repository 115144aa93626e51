export const COFFEE_TYPES = [
  'single_short',
  'single_medium',
  'single_long',
  'double_short',
  'double_medium',
  'double_long',
  'purge',
] as const;

export type CoffeeType = (typeof COFFEE_TYPES)[number];

/** Decoded selection bits of one group, one flag per coffee type. */
export type GroupSelection = Record<CoffeeType, boolean>;

export type ActivityState = 'idle' | 'active';

export interface RegisterSnapshot {
  groupId: number;
  activityState: ActivityState;
  coffeeTypeHint?: CoffeeType;
  timestamp: Date;
}

export interface IRegisterReader {
  /**
   * Read the current state of a group.
   * Rejects with HardwareUnavailableError when the machine cannot be queried.
   */
  read(groupId: number): Promise<RegisterSnapshot>;
}
