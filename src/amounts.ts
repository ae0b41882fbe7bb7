export const SATS_PER_BTC = 100_000_000n;

/**
 * Converts a node-reported BTC amount to satoshis, rounding to the nearest one.
 * Numeric strings are accepted since the RPC client may keep large values as text.
 * Anything else counts as zero.
 */
export function btcToSats(value: unknown): bigint {
  const btc = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof btc !== 'number' || !Number.isFinite(btc)) return 0n;
  return BigInt(Math.round(btc * 1e8));
}

export function satsToBtc(sats: bigint): number {
  return Number(sats) / 1e8;
}

// 5000000000n -> "50", 2999990000n -> "29.9999"
export function formatBtc(sats: bigint): string {
  const sign = sats < 0n ? '-' : '';
  const abs = sats < 0n ? -sats : sats;
  const whole = abs / SATS_PER_BTC;
  const fraction = abs % SATS_PER_BTC;
  if (fraction === 0n) return `${sign}${whole}`;
  const digits = fraction.toString().padStart(8, '0').replace(/0+$/, '');
  return `${sign}${whole}.${digits}`;
}
