import { HardwareUnavailableError } from '../errors/hardware-unavailable.error';
import {
  GroupSelection,
  IRegisterReader,
  RegisterSnapshot,
} from '../interfaces/register-reader.interface';
import {
  isSelectionActive,
  resolveCoffeeType,
} from '../utils/resolve-coffee-type';

/**
 * Hardware side of the reader: a connection to the machine's status
 * registers, already decoded into per-group selection bits.
 */
export interface GroupSelectionSource {
  ensureConnection(): Promise<boolean>;
  /** Resolves null when the group did not answer. */
  readGroupSelection(groupId: number): Promise<GroupSelection | null>;
}

export class GroupSelectionReader implements IRegisterReader {
  constructor(
    private readonly source: GroupSelectionSource,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async read(groupId: number): Promise<RegisterSnapshot> {
    let selection: GroupSelection | null;
    try {
      if (!(await this.source.ensureConnection())) {
        throw new HardwareUnavailableError(groupId, 'machine not connected');
      }
      selection = await this.source.readGroupSelection(groupId);
    } catch (error) {
      if (error instanceof HardwareUnavailableError) throw error;
      throw new HardwareUnavailableError(
        groupId,
        error instanceof Error ? error.message : String(error),
      );
    }

    if (!selection) {
      throw new HardwareUnavailableError(groupId, 'no status returned');
    }

    const active = isSelectionActive(selection);
    return {
      groupId,
      activityState: active ? 'active' : 'idle',
      coffeeTypeHint: active ? resolveCoffeeType(selection) : undefined,
      timestamp: this.now(),
    };
  }
}
