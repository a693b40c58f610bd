// This test suite verifies the address-amount object encoding used by send-to-many calls.

import { describe, expect, it } from 'vitest';
import { AddressAmounts, encodeAddressAmounts, encodeBtcAmount } from '../src/rpc/address-amounts.js';
import { toJsonValue } from '../src/utils/json.js';
import { BitcoinRpcError } from '../src/utils/errors.js';

describe('address amounts', () => {
  it('encodes pairs as an object keyed by address', () => {
    const encoded = encodeAddressAmounts([
      ['1Addr', 1.5],
      ['2Addr', 2.0]
    ]);

    expect(encoded).toEqual({ '1Addr': 1.5, '2Addr': 2 });
    expect(JSON.stringify(encoded)).toBe('{"1Addr":1.5,"2Addr":2}');
  });

  it('lets the last duplicate address win', () => {
    expect(
      encodeAddressAmounts([
        ['1Addr', 1],
        ['1Addr', 3]
      ])
    ).toEqual({ '1Addr': 3 });
  });

  it('keeps reserved-looking keys as plain properties', () => {
    expect(JSON.stringify(encodeAddressAmounts([['__proto__', 1]]))).toBe('{"__proto__":1}');
  });

  it('serializes through toJSON when nested in params', () => {
    const amounts = AddressAmounts.fromRecord({ '1Addr': 0.1 });

    expect(amounts.size).toBe(1);
    expect(toJsonValue(amounts)).toEqual({ '1Addr': 0.1 });
    expect(JSON.stringify(['', amounts])).toBe('["",{"1Addr":0.1}]');
  });
});

describe('amount encoding', () => {
  it('rounds to satoshi precision', () => {
    expect(encodeBtcAmount(0.123456789)).toBe(0.12345679);
    expect(encodeBtcAmount(0.1 + 0.2)).toBe(0.3);
    expect(encodeBtcAmount(21)).toBe(21);
  });

  it('rejects non-finite amounts', () => {
    expect(() => encodeBtcAmount(Number.NaN)).toThrow(BitcoinRpcError);
    expect(() => encodeBtcAmount(Number.POSITIVE_INFINITY)).toThrow('Amount must be a finite number, got Infinity.');
  });
});
