import { describe, it, expect } from 'vitest';
import {
  canonicalIdentity,
  classifyFamily,
  extractIdentityFromAddress,
  normalizeAddress,
  parseMac,
} from '../../src/meters/identity.js';
import type { PrefixTable } from '../../src/meters/families.js';

describe('parseMac', () => {
  it('accepts colon, dash and bare forms', () => {
    const octets = [0xb0, 0x03, 0x02, 0x00, 0x2b, 0xc1];
    expect(parseMac('B0:03:02:00:2B:C1')).toEqual(octets);
    expect(parseMac('b0-03-02-00-2b-c1')).toEqual(octets);
    expect(parseMac('b00302002bc1')).toEqual(octets);
  });

  it('rejects malformed addresses', () => {
    expect(parseMac('')).toBeNull();
    expect(parseMac('B0:03:02:00:2B')).toBeNull();
    expect(parseMac('B0:03:02:00:2B:C1:00')).toBeNull();
    expect(parseMac('G0:03:02:00:2B:C1')).toBeNull();
    expect(parseMac('0a1b2c3d-uuid-on-macos')).toBeNull();
  });
});

describe('normalizeAddress', () => {
  it('lowercases and uses colons', () => {
    expect(normalizeAddress('B0-10-01-01-E2-40')).toBe('b0:10:01:01:e2:40');
  });
});

describe('classifyFamily', () => {
  it('maps each product line to its family', () => {
    expect(classifyFamily('B0:10:01:01:E2:40')).toBe('gas');
    expect(classifyFamily('B0:42:01:00:00:01')).toBe('gas');
    expect(classifyFamily('B0:03:02:00:2B:C1')).toBe('water_temperature');
    expect(classifyFamily('b0:06:02:00:00:01')).toBe('water_temperature');
    expect(classifyFamily('B0:11:02:09:FB:F1')).toBe('water_dual_tariff');
  });

  it('distinguishes prefixes that share the first two octets', () => {
    expect(classifyFamily('B0:11:01:00:00:01')).toBe('gas');
    expect(classifyFamily('B0:11:02:00:00:01')).toBe('water_dual_tariff');
  });

  it('returns null for unknown prefixes and malformed addresses', () => {
    expect(classifyFamily('AA:BB:CC:00:00:01')).toBeNull();
    expect(classifyFamily('B0:07:02:00:00:01')).toBeNull();
    expect(classifyFamily('not-an-address')).toBeNull();
  });

  it('uses the first matching table when tables overlap', () => {
    const overlapping: PrefixTable[] = [
      { family: 'gas', prefixes: ['b0:11'] },
      { family: 'water_dual_tariff', prefixes: ['b0:11:02'] },
    ];
    expect(classifyFamily('B0:11:02:00:00:01', overlapping)).toBe('gas');
    expect(classifyFamily('B0:11:02:00:00:01', [...overlapping].reverse())).toBe(
      'water_dual_tariff',
    );
  });
});

describe('extractIdentityFromAddress', () => {
  it('reads the last three octets big-endian', () => {
    expect(extractIdentityFromAddress('B0:03:02:00:2B:C1')).toBe('11201');
    expect(extractIdentityFromAddress('B0:10:01:01:E2:40')).toBe('123456');
  });

  it('covers the full 3-byte range', () => {
    expect(extractIdentityFromAddress('B0:10:01:00:00:00')).toBe('0');
    expect(extractIdentityFromAddress('B0:10:01:FF:FF:FF')).toBe('16777215');
  });

  it('returns null for a malformed address', () => {
    expect(extractIdentityFromAddress('B0:10:01')).toBeNull();
  });
});

describe('canonicalIdentity', () => {
  it('normalizes text and numbers to plain decimal', () => {
    expect(canonicalIdentity(11201)).toBe('11201');
    expect(canonicalIdentity('0011201')).toBe('11201');
    expect(canonicalIdentity(' 42 ')).toBe('42');
    expect(canonicalIdentity('16777215')).toBe('16777215');
  });

  it('rejects values a 3-byte serial cannot hold', () => {
    expect(canonicalIdentity('16777216')).toBeNull();
    expect(canonicalIdentity(-1)).toBeNull();
    expect(canonicalIdentity(1.5)).toBeNull();
    expect(canonicalIdentity('12a')).toBeNull();
    expect(canonicalIdentity('')).toBeNull();
  });
});
