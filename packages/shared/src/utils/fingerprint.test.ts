import { describe, expect, test } from 'vitest';

import { fingerprint } from './fingerprint';

describe('fingerprint', () => {
  test('returns the sha256 hex digest', () => {
    expect(fingerprint('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
  });

  test('treats equal bytes from strings and buffers alike', () => {
    expect(fingerprint(Buffer.from('page-1'))).toBe(fingerprint('page-1'));
  });
});
