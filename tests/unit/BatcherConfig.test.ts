import { describe, it, expect } from 'vitest';
import { resolveBatcherConfig } from '../../src/BatcherConfig.js';
import type { BatcherConfig } from '../../src/BatcherConfig.js';
import { ConfigurationError } from '../../src/domain/errors/BatcherErrors.js';
import { constantSize } from '../../src/domain/services/sizeFunctions.js';

function optionOf(config: BatcherConfig<string>): string | undefined {
  try {
    resolveBatcherConfig(config);
  } catch (error) {
    if (error instanceof ConfigurationError) return error.option;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('resolveBatcherConfig', () => {
  it('should throw when neither maxBatchLen nor maxBatchSize is set', () => {
    expect(() => resolveBatcherConfig({})).toThrow(ConfigurationError);
    expect(() => resolveBatcherConfig({})).toThrow('At least one of maxBatchLen or maxBatchSize must be set');
  });

  it('should not count maxRecordSize as a batch limit', () => {
    expect(() => resolveBatcherConfig({ maxRecordSize: 10 })).toThrow(ConfigurationError);
  });

  it('should fill defaults for a count-only configuration', () => {
    const resolved = resolveBatcherConfig<string>({ maxBatchLen: 10 });

    expect(resolved.maxBatchLen).toBe(10);
    expect(resolved.maxBatchSize).toBeNull();
    expect(resolved.maxRecordSize).toBeNull();
    expect(resolved.sizeCalcFn).toBe(constantSize);
    expect(resolved.whenRecordSizeExceeded).toBe('error');
    expect(resolved.onHandlerError).toBeUndefined();
  });

  it('should default maxRecordSize to maxBatchSize', () => {
    expect(resolveBatcherConfig({ maxBatchSize: 5 }).maxRecordSize).toBe(5);
  });

  it('should keep an explicit maxRecordSize below maxBatchSize', () => {
    expect(resolveBatcherConfig({ maxBatchSize: 5, maxRecordSize: 3 }).maxRecordSize).toBe(3);
  });

  it.each([0, -1, 1.5, Number.NaN, Number.POSITIVE_INFINITY])('should reject maxBatchLen %s', (maxBatchLen) => {
    expect(optionOf({ maxBatchLen })).toBe('maxBatchLen');
  });

  it.each([0, -3, Number.NaN, Number.POSITIVE_INFINITY])('should reject maxBatchSize %s', (maxBatchSize) => {
    expect(optionOf({ maxBatchSize })).toBe('maxBatchSize');
  });

  it('should accept a fractional maxBatchSize', () => {
    expect(resolveBatcherConfig({ maxBatchSize: 0.5 }).maxBatchSize).toBe(0.5);
  });

  it('should reject a non-positive maxRecordSize', () => {
    expect(optionOf({ maxBatchLen: 2, maxRecordSize: 0 })).toBe('maxRecordSize');
  });

  it('should reject maxRecordSize above maxBatchSize', () => {
    expect(() => resolveBatcherConfig({ maxBatchSize: 5, maxRecordSize: 6 })).toThrow(
      'maxRecordSize (6) must not exceed maxBatchSize (5)',
    );
  });

  it('should reject an unknown whenRecordSizeExceeded value from untyped callers', () => {
    const config: BatcherConfig<string> = JSON.parse('{"maxBatchLen": 2, "whenRecordSizeExceeded": "raises"}');

    expect(() => resolveBatcherConfig(config)).toThrow("whenRecordSizeExceeded must be 'skip' or 'error', got raises");
  });

  it('should reject a sizeCalcFn that is not a function', () => {
    const config: BatcherConfig<string> = JSON.parse('{"maxBatchLen": 2, "sizeCalcFn": 4}');

    expect(optionOf(config)).toBe('sizeCalcFn');
  });
});
