import StateMachine from 'javascript-state-machine';
import { InvalidStatusTransitionError } from '../errors/invalid-status-transition.error';
import {
  DeliveryStatus,
  isDeliveryStatus,
} from '../interfaces/delivery-records.interface';

export type DeliveryAction = 'progress' | 'complete' | 'fail';

const OPEN = [DeliveryStatus.STARTED, DeliveryStatus.IN_PROGRESS];

const TRANSITIONS = [
  {
    name: 'progress',
    from: DeliveryStatus.STARTED,
    to: DeliveryStatus.IN_PROGRESS,
  },
  { name: 'complete', from: OPEN, to: DeliveryStatus.COMPLETED },
  { name: 'fail', from: OPEN, to: DeliveryStatus.FAILED },
];

/**
 * Resolves the status a delivery moves to when `action` is applied.
 * Completed and failed deliveries are closed and accept no action.
 */
export function nextDeliveryStatus(
  current: DeliveryStatus,
  action: DeliveryAction,
): DeliveryStatus {
  const fsm = new StateMachine({ init: current, transitions: TRANSITIONS });

  if (!fsm.can(action)) {
    throw new InvalidStatusTransitionError(current, action);
  }

  const transitionFn = fsm[action];
  if (typeof transitionFn !== 'function') {
    throw new Error(`Transition ${action} is not available on status machine`);
  }
  transitionFn.call(fsm);

  const next = fsm.state;
  if (!isDeliveryStatus(next)) {
    throw new Error(`Status machine settled on unknown status "${next}"`);
  }
  return next;
}

export function allowedDeliveryActions(
  current: DeliveryStatus,
): DeliveryAction[] {
  const fsm = new StateMachine({ init: current, transitions: TRANSITIONS });
  const actions: DeliveryAction[] = ['progress', 'complete', 'fail'];
  return actions.filter((action) => fsm.can(action));
}
