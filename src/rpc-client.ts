import BitcoinCore from 'bitcoin-core';
import { btcToSats, satsToBtc } from './amounts.js';
import type { DemoConfig } from './config.js';
import { DemoError, errorMessage, rpcErrorCode } from './errors.js';
import { asRecord, readInteger, readString, type JsonRecord } from './json-fields.js';

/** The single transport every node call goes through. */
export interface RpcTransport {
  call(method: string, params: unknown[]): Promise<unknown>;
}

export interface BlockchainInfo {
  chain: string;
  blocks: number;
  bestBlockHash: string;
}

export interface SendResult {
  complete: boolean;
  txid: string;
}

/** Opens a client for the node itself, or for one of its wallets. */
export type NodeConnector = (wallet?: string) => NodeRpc;

export class BitcoinCoreTransport implements RpcTransport {
  constructor(
    private readonly client: BitcoinCore,
    private readonly wallet?: string,
  ) {}

  async call(method: string, params: unknown[]): Promise<unknown> {
    if (this.wallet !== undefined) this.routeToWallet(method);
    try {
      return await this.client.command(method, ...params);
    } catch (error) {
      throw new DemoError({
        message: `${method} failed: ${errorMessage(error)}`,
        kind: 'rpc',
        code: rpcErrorCode(error),
        cause: error,
      });
    }
  }

  // bitcoin-core only uses the wallet path for methods its table marks as multiwallet; `send` is not one of them
  private routeToWallet(method: string): void {
    const known = this.client.methods[method];
    if (known?.features?.multiwallet?.supported) return;
    this.client.methods[method] = {
      ...known,
      features: { ...known?.features, multiwallet: { supported: true } },
      supported: true,
    };
  }
}

export function createNodeConnector(config: DemoConfig): NodeConnector {
  return (wallet?: string) =>
    new NodeRpc(
      new BitcoinCoreTransport(
        new BitcoinCore({
          host: config.rpcHost,
          port: config.rpcPort,
          username: config.rpcUser,
          password: config.rpcPassword,
          wallet,
        }),
        wallet,
      ),
    );
}

function unexpected(method: string, result: unknown): DemoError {
  return new DemoError({
    message: `${method} returned an unexpected result: ${JSON.stringify(result)}`,
    kind: 'rpc',
  });
}

/**
 * Typed methods for the calls this walkthrough makes, plus `call` for anything
 * the typed surface does not cover. Both share the same transport.
 */
export class NodeRpc {
  constructor(private readonly transport: RpcTransport) {}

  call(method: string, ...params: unknown[]): Promise<unknown> {
    return this.transport.call(method, params);
  }

  async getBlockchainInfo(): Promise<BlockchainInfo> {
    const info = asRecord(await this.call('getblockchaininfo'));
    if (!info) throw unexpected('getblockchaininfo', info);
    return {
      chain: readString(info.chain),
      blocks: readInteger(info.blocks),
      bestBlockHash: readString(info.bestblockhash),
    };
  }

  async unloadWallet(name: string): Promise<void> {
    await this.call('unloadwallet', name);
  }

  async loadWallet(name: string): Promise<void> {
    await this.call('loadwallet', name);
  }

  async createWallet(name: string): Promise<void> {
    await this.call('createwallet', name);
  }

  async getNewAddress(label: string): Promise<string> {
    const address = await this.call('getnewaddress', label);
    if (typeof address !== 'string') throw unexpected('getnewaddress', address);
    return address;
  }

  /** Trusted wallet balance, in satoshis. */
  async getBalance(): Promise<bigint> {
    const balance = await this.call('getbalance');
    if (typeof balance !== 'number' && typeof balance !== 'string') throw unexpected('getbalance', balance);
    return btcToSats(balance);
  }

  async generateToAddress(blocks: number, address: string): Promise<string[]> {
    const hashes = await this.call('generatetoaddress', blocks, address);
    if (!Array.isArray(hashes) || !hashes.every((hash): hash is string => typeof hash === 'string')) {
      throw unexpected('generatetoaddress', hashes);
    }
    return hashes;
  }

  // comment_to is left empty; fee subtraction and RBF are off, fee estimation is the node's
  async sendToAddress(address: string, amount: bigint, comment: string): Promise<string> {
    const txid = await this.call('sendtoaddress', address, satsToBtc(amount), comment, '', false, false);
    if (typeof txid !== 'string') throw unexpected('sendtoaddress', txid);
    return txid;
  }

  async send(address: string, amount: bigint): Promise<SendResult> {
    const outputs = [{ [address]: satsToBtc(amount) }];
    const result = asRecord(await this.call('send', outputs, null, null, null, null));
    if (!result || typeof result.complete !== 'boolean') throw unexpected('send', result);
    return { complete: result.complete, txid: readString(result.txid) };
  }

  getRawTransaction(txid: string): Promise<unknown> {
    return this.call('getrawtransaction', txid, true);
  }

  async getMempoolEntry(txid: string): Promise<JsonRecord> {
    const entry = asRecord(await this.call('getmempoolentry', txid));
    if (!entry) throw unexpected('getmempoolentry', entry);
    return entry;
  }

  getBlock(hash: string): Promise<unknown> {
    return this.call('getblock', hash);
  }
}
