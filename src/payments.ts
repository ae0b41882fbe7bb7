import { DemoError, errorMessage, rpcErrorCode } from './errors.js';
import type { SendMethod } from './config.js';
import type { NodeRpc, SendResult } from './rpc-client.js';

function sendFailure(address: string, error: unknown): DemoError {
  return new DemoError({
    message: `Payment to ${address} rejected: ${errorMessage(error)}`,
    kind: 'tx',
    code: rpcErrorCode(error),
    cause: error,
  });
}

/** Pays `amount` satoshis from `wallet` via sendtoaddress; node fee defaults apply. */
export async function sendPayment(wallet: NodeRpc, address: string, amount: bigint, label: string): Promise<string> {
  try {
    return await wallet.sendToAddress(address, amount, label);
  } catch (error) {
    throw sendFailure(address, error);
  }
}

/** Same payment through the generic `send` RPC, which answers `{ complete, txid }`. */
export async function sendWithSendRpc(wallet: NodeRpc, address: string, amount: bigint): Promise<string> {
  let result: SendResult;
  try {
    result = await wallet.send(address, amount);
  } catch (error) {
    throw sendFailure(address, error);
  }

  if (!result.complete || result.txid === '') {
    throw new DemoError({ message: `send to ${address} did not produce a complete transaction`, kind: 'tx' });
  }
  return result.txid;
}

export function dispatchPayment(
  method: SendMethod,
  wallet: NodeRpc,
  address: string,
  amount: bigint,
  label: string,
): Promise<string> {
  return method === 'send' ? sendWithSendRpc(wallet, address, amount) : sendPayment(wallet, address, amount, label);
}
