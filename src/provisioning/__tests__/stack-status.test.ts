import { describe, it, expect } from 'vitest';
import { classifyCreateStatus, classifyDeleteStatus } from '../stack-status';

describe('classifyCreateStatus', () => {
  it('should report ready on CREATE_COMPLETE', () => {
    expect(classifyCreateStatus('demo', { stackName: 'demo', status: 'CREATE_COMPLETE' })).toEqual({ state: 'ready' });
  });

  it('should keep waiting while the stack is in progress', () => {
    expect(classifyCreateStatus('demo', { stackName: 'demo', status: 'CREATE_IN_PROGRESS' })).toEqual({
      state: 'pending',
      detail: 'CREATE_IN_PROGRESS'
    });
  });

  it('should fail on a rollback with the provider reason', () => {
    const observation = classifyCreateStatus('demo', {
      stackName: 'demo',
      status: 'ROLLBACK_COMPLETE',
      statusReason: 'The following resource(s) failed to create: [Bucket].'
    });

    expect(observation).toEqual({
      state: 'failed',
      reason: 'Stack demo entered ROLLBACK_COMPLETE: The following resource(s) failed to create: [Bucket].'
    });
  });

  it('should fail when the stack disappeared', () => {
    expect(classifyCreateStatus('demo', null)).toEqual({ state: 'failed', reason: 'Stack demo does not exist' });
  });
});

describe('classifyDeleteStatus', () => {
  it('should treat a missing stack as deleted', () => {
    expect(classifyDeleteStatus(null)).toEqual({ state: 'ready' });
  });

  it('should report ready on DELETE_COMPLETE', () => {
    expect(classifyDeleteStatus({ stackName: 'demo', status: 'DELETE_COMPLETE' })).toEqual({ state: 'ready' });
  });

  it('should keep waiting on DELETE_IN_PROGRESS', () => {
    expect(classifyDeleteStatus({ stackName: 'demo', status: 'DELETE_IN_PROGRESS' })).toEqual({
      state: 'pending',
      detail: 'DELETE_IN_PROGRESS'
    });
  });

  it('should fail on DELETE_FAILED', () => {
    expect(classifyDeleteStatus({ stackName: 'demo', status: 'DELETE_FAILED' })).toEqual({
      state: 'failed',
      reason: 'Stack demo entered DELETE_FAILED'
    });
  });
});
