import { describe, it, expect } from 'vitest';
import { describeBarViolation } from '../src/validate.js';

const valid = {
  timestamp: '2025-01-02T00:00:00.000Z',
  open: 100,
  high: 102,
  low: 99,
  close: 101,
  volume: 5000,
};

describe('describeBarViolation', () => {
  it('should accept a valid bar', () => {
    expect(describeBarViolation(valid)).toBeUndefined();
  });

  it('should reject non-positive prices', () => {
    expect(describeBarViolation({ ...valid, low: 0 })).toBe(
      'low must be a positive finite number, got 0'
    );
  });

  it('should reject negative volume', () => {
    expect(describeBarViolation({ ...valid, volume: -1 })).toBe(
      'volume must be a non-negative finite number, got -1'
    );
  });

  it('should reject a high below the close', () => {
    expect(describeBarViolation({ ...valid, high: 100.5 })).toBe(
      'high (100.5) must be >= open (100) and close (101)'
    );
  });

  it('should reject a low above the open', () => {
    expect(describeBarViolation({ ...valid, low: 100.2 })).toBe(
      'low (100.2) must be <= open (100) and close (101)'
    );
  });

  it('should reject an unparseable timestamp', () => {
    expect(describeBarViolation({ ...valid, timestamp: 'yesterday' })).toBe(
      'timestamp is not a valid date: yesterday'
    );
  });
});
