import { btcToSats } from './amounts.js';
import { DemoError } from './errors.js';

export type SendMethod = 'sendtoaddress' | 'send';

export interface DemoConfig {
  rpcUrl: string;
  rpcHost: string;
  rpcPort: number;
  rpcUser: string;
  rpcPassword: string;
  minerWallet: string;
  traderWallet: string;
  /** Payment size, in satoshis. */
  sendAmount: bigint;
  sendMethod: SendMethod;
  outputPath: string;
  unloadDelayMs: number;
  walletSetupPauseMs: number;
}

type Env = Record<string, string | undefined>;

function readNonNegativeNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new DemoError({ message: `${key} must be a non-negative number, got "${raw}"`, kind: 'config' });
  }
  return value;
}

// bitcoin-core takes host and port separately
function parseRpcUrl(raw: string): { host: string; port: number } {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new DemoError({ message: `BITCOIN_RPC_URL must be a URL, got "${raw}"`, kind: 'config' });
  }
  if (url.protocol !== 'http:' || url.hostname === '') {
    throw new DemoError({ message: `BITCOIN_RPC_URL must be an http:// URL, got "${raw}"`, kind: 'config' });
  }
  return { host: url.hostname, port: url.port === '' ? 18443 : Number(url.port) };
}

function readSendMethod(env: Env): SendMethod {
  const raw = env.SEND_METHOD || 'sendtoaddress';
  if (raw === 'sendtoaddress' || raw === 'send') return raw;
  throw new DemoError({ message: `SEND_METHOD must be "sendtoaddress" or "send", got "${raw}"`, kind: 'config' });
}

export function loadConfig(env: Env = process.env): DemoConfig {
  const sendAmount = btcToSats(readNonNegativeNumber(env, 'SEND_AMOUNT_BTC', 20));
  if (sendAmount <= 0n) {
    throw new DemoError({ message: 'SEND_AMOUNT_BTC must be greater than zero', kind: 'config' });
  }

  const rpcUrl = env.BITCOIN_RPC_URL || 'http://127.0.0.1:18443';
  const { host, port } = parseRpcUrl(rpcUrl);

  return {
    rpcUrl,
    rpcHost: host,
    rpcPort: port,
    rpcUser: env.BITCOIN_RPC_USER || 'alice',
    rpcPassword: env.BITCOIN_RPC_PASSWORD || 'password',
    minerWallet: env.MINER_WALLET || 'Miner',
    traderWallet: env.TRADER_WALLET || 'Trader',
    sendAmount,
    sendMethod: readSendMethod(env),
    outputPath: env.OUTPUT_PATH || 'out.txt',
    unloadDelayMs: readNonNegativeNumber(env, 'WALLET_UNLOAD_DELAY_MS', 1000),
    walletSetupPauseMs: readNonNegativeNumber(env, 'WALLET_SETUP_PAUSE_MS', 500),
  };
}
