export const MONITOR_MODULE_OPTIONS = Symbol('MONITOR_MODULE_OPTIONS');
export const DELIVERY_STORE = Symbol('DELIVERY_STORE');
export const REGISTER_READER = Symbol('REGISTER_READER');

export const DEFAULT_GROUPS: readonly number[] = [1, 2, 3];
export const MAX_GROUPS = 4;
export const DEFAULT_POLL_INTERVAL_MS = 2000;
export const MIN_POLL_INTERVAL_MS = 100;
export const DEFAULT_TABLE_NAME = 'coffee_deliveries';
export const POLL_INTERVAL_NAME = 'manual-delivery-poll';

export const HARDWARE_UNAVAILABLE_MESSAGE = 'hardware unavailable';
export const UNKNOWN_COFFEE_TYPE = 'unknown';

export const DEFAULT_REPORT_LIMIT = 50;
export const MAX_REPORT_LIMIT = 500;
