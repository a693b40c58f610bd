// This module encodes address/amount pairs as the JSON object that send-to-many style calls expect.

import { z } from 'zod';
import type { AddressAmountPair, BtcAmount } from '../types/domain.js';
import type { JsonValue, ToJson } from '../types/rpc.js';
import { BitcoinRpcError } from '../utils/errors.js';

const SATOSHIS_PER_BTC = 100_000_000;

export const btcAmountSchema = z
  .number()
  .finite()
  .transform((value) => Math.round(value * SATOSHIS_PER_BTC) / SATOSHIS_PER_BTC);

// This helper fixes an amount's wire form at satoshi precision.
export function encodeBtcAmount(amount: BtcAmount): number {
  const parsed = btcAmountSchema.safeParse(amount);
  if (!parsed.success) {
    throw new BitcoinRpcError('invalid_amount', `Amount must be a finite number, got ${String(amount)}.`);
  }

  return parsed.data;
}

// Encode-only: duplicate addresses are not validated and the last pair wins.
export class AddressAmounts implements ToJson {
  private readonly pairs: readonly AddressAmountPair[];

  public constructor(pairs: Iterable<AddressAmountPair>) {
    this.pairs = Array.from(pairs);
  }

  public static fromRecord(record: Record<string, BtcAmount>): AddressAmounts {
    return new AddressAmounts(Object.entries(record));
  }

  public get size(): number {
    return this.pairs.length;
  }

  public toJSON(): { [address: string]: JsonValue } {
    return Object.fromEntries(this.pairs.map(([address, amount]) => [address, encodeBtcAmount(amount)] as const));
  }
}

export function encodeAddressAmounts(pairs: Iterable<AddressAmountPair>): { [address: string]: JsonValue } {
  return new AddressAmounts(pairs).toJSON();
}
