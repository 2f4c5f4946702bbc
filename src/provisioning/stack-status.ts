import { StackDescription } from './types';
import { PollObservation } from './poller';

const CREATE_FAILURE_STATUSES = new Set([
  'CREATE_FAILED',
  'DELETE_IN_PROGRESS',
  'DELETE_COMPLETE',
  'DELETE_FAILED',
  'ROLLBACK_IN_PROGRESS',
  'ROLLBACK_FAILED',
  'ROLLBACK_COMPLETE',
  'UPDATE_ROLLBACK_IN_PROGRESS',
  'UPDATE_ROLLBACK_FAILED',
  'UPDATE_ROLLBACK_COMPLETE'
]);

const DELETE_FAILURE_STATUSES = new Set([
  'DELETE_FAILED',
  'CREATE_FAILED',
  'ROLLBACK_FAILED',
  'UPDATE_ROLLBACK_IN_PROGRESS',
  'UPDATE_ROLLBACK_FAILED'
]);

function failureReason(stack: StackDescription): string {
  const reason = stack.statusReason ? `: ${stack.statusReason}` : '';
  return `Stack ${stack.stackName} entered ${stack.status}${reason}`;
}

export function classifyCreateStatus(stackName: string, stack: StackDescription | null): PollObservation {
  if (!stack) {
    return { state: 'failed', reason: `Stack ${stackName} does not exist` };
  }
  if (stack.status === 'CREATE_COMPLETE') {
    return { state: 'ready' };
  }
  if (CREATE_FAILURE_STATUSES.has(stack.status)) {
    return { state: 'failed', reason: failureReason(stack) };
  }
  return { state: 'pending', detail: stack.status };
}

export function classifyDeleteStatus(stack: StackDescription | null): PollObservation {
  if (!stack || stack.status === 'DELETE_COMPLETE') {
    return { state: 'ready' };
  }
  if (DELETE_FAILURE_STATUSES.has(stack.status)) {
    return { state: 'failed', reason: failureReason(stack) };
  }
  return { state: 'pending', detail: stack.status };
}
