import { describe, it, expect } from 'vitest';
import { BatcherStatus, canTransition, isTerminal } from '../../../src/domain/model/BatcherStatus.js';

describe('BatcherStatus', () => {
  it('should allow the normal lifecycle', () => {
    expect(canTransition(BatcherStatus.CREATED, BatcherStatus.RUNNING)).toBe(true);
    expect(canTransition(BatcherStatus.RUNNING, BatcherStatus.COMPLETED)).toBe(true);
    expect(canTransition(BatcherStatus.RUNNING, BatcherStatus.FAILED)).toBe(true);
  });

  it('should allow closing before or during a run', () => {
    expect(canTransition(BatcherStatus.CREATED, BatcherStatus.CLOSED)).toBe(true);
    expect(canTransition(BatcherStatus.RUNNING, BatcherStatus.CLOSED)).toBe(true);
  });

  it('should not allow completing a run that never started', () => {
    expect(canTransition(BatcherStatus.CREATED, BatcherStatus.COMPLETED)).toBe(false);
  });

  it.each([BatcherStatus.COMPLETED, BatcherStatus.FAILED, BatcherStatus.CLOSED])(
    'should treat %s as terminal',
    (status) => {
      expect(isTerminal(status)).toBe(true);
      expect(canTransition(status, BatcherStatus.RUNNING)).toBe(false);
    },
  );

  it('should not treat CREATED or RUNNING as terminal', () => {
    expect(isTerminal(BatcherStatus.CREATED)).toBe(false);
    expect(isTerminal(BatcherStatus.RUNNING)).toBe(false);
  });
});
