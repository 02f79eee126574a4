import { EVENT_STATUSES, EventStatus, REQUEST_STATUSES, RequestStatus } from '../models/types.js';
import { loadMachine } from './machine_loader.js';

export const requestMachine = loadMachine('program_request', REQUEST_STATUSES);
export const eventMachine = loadMachine('event', EVENT_STATUSES);

export function canTransitionRequest(current: RequestStatus, next: RequestStatus) {
  return requestMachine.canTransition(current, next);
}

export function canTransitionEvent(current: EventStatus, next: EventStatus) {
  return eventMachine.canTransition(current, next);
}
