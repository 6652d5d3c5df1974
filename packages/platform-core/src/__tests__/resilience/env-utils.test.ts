import { describe, it, expect } from 'vitest';
import { parsePositiveInt } from '../../resilience/env-utils';

describe('parsePositiveInt', () => {
  it('should return the default when the variable is unset or empty', () => {
    expect(parsePositiveInt('CATALOG_SYNC_BATCH_SIZE', 3, 1, {})).toBe(3);
    expect(parsePositiveInt('CATALOG_SYNC_BATCH_SIZE', 3, 1, { CATALOG_SYNC_BATCH_SIZE: '' })).toBe(3);
  });

  it('should parse an integer value', () => {
    expect(parsePositiveInt('CATALOG_SYNC_BATCH_SIZE', 3, 1, { CATALOG_SYNC_BATCH_SIZE: '5' })).toBe(5);
  });

  it('should reject values that are not numbers or below the minimum', () => {
    expect(() => parsePositiveInt('CATALOG_SYNC_BATCH_SIZE', 3, 1, { CATALOG_SYNC_BATCH_SIZE: 'many' })).toThrow(
      'Invalid CATALOG_SYNC_BATCH_SIZE: "many". Must be an integer >= 1. Default is 3.'
    );
    expect(() => parsePositiveInt('CATALOG_LOAD_BUDGET_MS', 30000, 1000, { CATALOG_LOAD_BUDGET_MS: '10' })).toThrow(
      'Must be an integer >= 1000'
    );
  });
});
