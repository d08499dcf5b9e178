import { describe, it, expect } from 'vitest';
import { generateUUIDv7 } from './id.js';

const UUID_V7 = /^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('generateUUIDv7', () => {
  it('produces version 7, variant 1 ids', () => {
    expect(generateUUIDv7()).toMatch(UUID_V7);
  });

  it('encodes the timestamp in the first 48 bits', () => {
    const ms = Date.UTC(2030, 0, 1);
    const id = generateUUIDv7(ms);
    expect(parseInt(id.replace(/-/g, '').slice(0, 12), 16)).toBe(ms);
  });

  it('sorts in creation order within one millisecond', () => {
    const ms = Date.UTC(2031, 5, 1);
    const ids = Array.from({ length: 50 }, () => generateUUIDv7(ms));
    expect([...ids].sort()).toEqual(ids);
    expect(new Set(ids).size).toBe(50);
  });

  it('never goes backwards when the clock does', () => {
    const later = generateUUIDv7(Date.UTC(2032, 0, 1, 0, 0, 1));
    const earlier = generateUUIDv7(Date.UTC(2032, 0, 1));
    expect(earlier > later).toBe(true);
  });
});
