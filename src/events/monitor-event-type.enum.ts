export enum MonitorEventType {
  DELIVERY_STARTED = 'delivery.started',
  DELIVERY_COMPLETED = 'delivery.completed',
  DELIVERY_FAILED = 'delivery.failed',
  CYCLE_COMPLETED = 'monitor.cycle.completed',
  MONITORING_STARTED = 'monitor.started',
  MONITORING_STOPPED = 'monitor.stopped',
}
