import {
  COFFEE_TYPES,
  CoffeeType,
  GroupSelection,
} from '../interfaces/register-reader.interface';

/**
 * Picks the coffee type of an active group. When several selection bits are
 * set, the first one in COFFEE_TYPES order wins.
 */
export function resolveCoffeeType(
  selection: GroupSelection,
): CoffeeType | undefined {
  return COFFEE_TYPES.find((type) => selection[type]);
}

export function isSelectionActive(selection: GroupSelection): boolean {
  return COFFEE_TYPES.some((type) => selection[type]);
}
