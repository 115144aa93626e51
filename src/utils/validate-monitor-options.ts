import { InvalidMonitorOptionsError } from '../errors/invalid-monitor-options.error';
import type {
  DeliveryMonitorModuleOptions,
  ResolvedMonitorOptions,
} from '../interfaces/monitor-module-options.interface';
import {
  DEFAULT_GROUPS,
  DEFAULT_POLL_INTERVAL_MS,
  MAX_GROUPS,
  MIN_POLL_INTERVAL_MS,
} from '../monitor.constants';

export function validateMonitorOptions(
  options: Omit<DeliveryMonitorModuleOptions, 'store' | 'reader'>,
): ResolvedMonitorOptions {
  const groups = options.groups ?? [...DEFAULT_GROUPS];

  if (groups.length === 0) {
    throw new InvalidMonitorOptionsError('at least one group is required');
  }

  for (const group of groups) {
    if (!Number.isInteger(group) || group < 1 || group > MAX_GROUPS) {
      throw new InvalidMonitorOptionsError(
        `group ${String(group)} is not an integer between 1 and ${MAX_GROUPS}`,
      );
    }
  }

  if (new Set(groups).size !== groups.length) {
    throw new InvalidMonitorOptionsError(
      `groups must be unique, got [${groups.join(', ')}]`,
    );
  }

  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  if (
    !Number.isFinite(pollIntervalMs) ||
    pollIntervalMs < MIN_POLL_INTERVAL_MS
  ) {
    throw new InvalidMonitorOptionsError(
      `pollIntervalMs must be at least ${MIN_POLL_INTERVAL_MS}, got ${pollIntervalMs}`,
    );
  }

  return {
    groups: [...groups].sort((a, b) => a - b),
    pollIntervalMs,
    enablePolling: options.enablePolling ?? true,
    startEnabled: options.startEnabled ?? false,
  };
}
