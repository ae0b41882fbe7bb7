import { btcToSats } from './amounts.js';
import { field, item, readInteger, readString } from './json-fields.js';
import type { NodeRpc } from './rpc-client.js';

export interface ReconciliationResult {
  txid: string;
  inputAddress: string;
  /** Amounts are in satoshis. */
  inputAmount: bigint;
  outputAddress: string;
  outputAmount: bigint;
  changeAddress: string;
  changeAmount: bigint;
  fee: bigint;
  blockHeight: number;
  blockHash: string;
}

export interface TxOutput {
  address: string;
  amount: bigint;
}

export interface OutPoint {
  txid: string;
  vout: number;
}

/** Reads `vout[index]` of a verbose transaction; absent outputs read as `""` / 0. */
export function readOutput(tx: unknown, index: number): TxOutput {
  const output = item(field(tx, 'vout'), index);
  return {
    address: readString(field(field(output, 'scriptPubKey'), 'address')),
    amount: btcToSats(field(output, 'value')),
  };
}

/** The outpoint spent by the first input, if it spends one (coinbase inputs do not). */
export function readFirstInput(tx: unknown): OutPoint | undefined {
  const input = item(field(tx, 'vin'), 0);
  const txid = readString(field(input, 'txid'));
  if (txid === '') return undefined;
  return { txid, vout: readInteger(field(input, 'vout')) };
}

export function computeFee(input: bigint, output: bigint, change: bigint): bigint {
  return input - output - change;
}

/**
 * Pulls the payment's addresses, amounts, fee and confirming block out of the
 * node. Assumes a single-recipient send: payee at output 0, change at output 1.
 * Missing fields fall back to empty strings and zero amounts.
 */
export class TransactionReconciler {
  constructor(private readonly node: NodeRpc) {}

  async reconcile(txid: string, blockHash: string): Promise<ReconciliationResult> {
    const tx = await this.node.getRawTransaction(txid);
    console.log(` Transaction details: ${JSON.stringify(tx, null, 2)}`);

    // inputs only reference the spent output, so its value lives in the previous transaction
    const spent = readFirstInput(tx);
    const input = spent
      ? readOutput(await this.node.getRawTransaction(spent.txid), spent.vout)
      : { address: '', amount: 0n };

    const payee = readOutput(tx, 0);
    const change = readOutput(tx, 1);
    const block = await this.node.getBlock(blockHash);

    return {
      txid: readString(field(tx, 'txid')),
      inputAddress: input.address,
      inputAmount: input.amount,
      outputAddress: payee.address,
      outputAmount: payee.amount,
      changeAddress: change.address,
      changeAmount: change.amount,
      fee: computeFee(input.amount, payee.amount, change.amount),
      blockHeight: readInteger(field(block, 'height')),
      blockHash: readString(field(block, 'hash')),
    };
  }
}
