/**
 * Status vocabulary tests
 */

import { describe, it, expect } from 'vitest';
import { isStatusAlias, parseStatus } from '../src/store/status-vocabulary.js';

describe('parseStatus', () => {
  it('should accept canonical statuses in any case', () => {
    expect(parseStatus('posted')).toBe('posted');
    expect(parseStatus('  Generating ')).toBe('generating');
    expect(parseStatus('FAILED')).toBe('failed');
  });

  it('should map display values to canonical statuses', () => {
    expect(parseStatus('yes')).toBe('posted');
    expect(parseStatus('Oui')).toBe('posted');
    expect(parseStatus('no')).toBe('pending');
    expect(parseStatus('NON')).toBe('pending');
  });

  it('should treat a blank cell as pending', () => {
    expect(parseStatus('')).toBe('pending');
    expect(parseStatus('   ')).toBe('pending');
    expect(parseStatus(null)).toBe('pending');
    expect(parseStatus(undefined)).toBe('pending');
  });

  it('should reject unknown values', () => {
    expect(parseStatus('maybe')).toBeNull();
    expect(parseStatus('constructor')).toBeNull();
  });
});

describe('isStatusAlias', () => {
  it('should tell display values from canonical statuses', () => {
    expect(isStatusAlias('yes')).toBe(true);
    expect(isStatusAlias('')).toBe(true);
    expect(isStatusAlias('posted')).toBe(false);
    expect(isStatusAlias('toString')).toBe(false);
  });
});
