export interface DeliveryStartedEvent {
  deliveryId: string;
  groupNumber: number;
  coffeeType: string;
  startedAt: Date;
  timestamp: Date;
}

export interface DeliveryCompletedEvent {
  deliveryId: string;
  groupNumber: number;
  coffeeType: string;
  startedAt: Date;
  completedAt: Date;
  retroactive: boolean;
  timestamp: Date;
}

export interface DeliveryFailedEvent {
  deliveryId: string;
  groupNumber: number;
  coffeeType: string;
  errorMessage: string;
  timestamp: Date;
}

export interface CycleCompletedEvent {
  activityCount: number;
  warningCount: number;
  groupsScanned: number;
  durationMs: number;
  timestamp: Date;
}

export interface MonitoringToggledEvent {
  enabled: boolean;
  timestamp: Date;
}
