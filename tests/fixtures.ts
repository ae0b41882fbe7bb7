import { NodeRpc, type RpcTransport } from '../src/rpc-client.js';

export const PREV_TXID = 'a1'.repeat(32);
export const TXID = 'b2'.repeat(32);
export const BLOCK_HASH = '3c'.repeat(32);
export const MINER_ADDRESS = 'bcrt1qminerinput0000000000000000000000000';
export const TRADER_ADDRESS = 'bcrt1qtraderpayee000000000000000000000000';
export const CHANGE_ADDRESS = 'bcrt1qminerchange00000000000000000000000';

export function output(value: unknown, address?: string, n = 0): unknown {
  return address === undefined ? { value, n } : { value, n, scriptPubKey: { address, type: 'witness_v0_keyhash' } };
}

export const previousTx = {
  txid: PREV_TXID,
  vin: [{ coinbase: '0101', sequence: 4294967295 }],
  vout: [output(50, MINER_ADDRESS)],
};

export const paymentTx = {
  txid: TXID,
  vin: [{ txid: PREV_TXID, vout: 0, sequence: 4294967293 }],
  vout: [output(20, TRADER_ADDRESS, 0), output(29.9999, CHANGE_ADDRESS, 1)],
};

export const confirmationBlock = { hash: BLOCK_HASH, height: 102, tx: [PREV_TXID, TXID] };

/** Answers getrawtransaction by txid and getblock by hash from fixed JSON. */
export function fixtureNode(transactions: Record<string, unknown>, blocks: Record<string, unknown>) {
  const calls: Array<{ method: string; params: unknown[] }> = [];
  const transport: RpcTransport = {
    async call(method, params) {
      calls.push({ method, params });
      const key = String(params[0]);
      if (method === 'getrawtransaction' && key in transactions) return transactions[key];
      if (method === 'getblock' && key in blocks) return blocks[key];
      throw Object.assign(new Error(`${method} ${key} not found`), { code: -5 });
    },
  };
  return { node: new NodeRpc(transport), calls };
}
