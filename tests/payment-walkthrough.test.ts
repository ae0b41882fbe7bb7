import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig, type DemoConfig } from '../src/config.js';
import { PaymentWalkthrough } from '../src/payment-walkthrough.js';
import { FakeRegtestNode } from './fake-node.js';

describe('PaymentWalkthrough', () => {
  const maturity = 3;
  let dir: string;
  let config: DemoConfig;
  let node: FakeRegtestNode;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    dir = await mkdtemp(path.join(tmpdir(), 'walkthrough-'));
    config = loadConfig({
      OUTPUT_PATH: path.join(dir, 'out.txt'),
      WALLET_UNLOAD_DELAY_MS: '0',
      WALLET_SETUP_PAUSE_MS: '0',
    });
    node = new FakeRegtestNode(maturity);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('mines, pays the trader and writes the reconciled report', async () => {
    const result = await new PaymentWalkthrough(config, node.connect).run();

    expect(result).toMatchObject({
      inputAddress: 'bcrt1qminer0001',
      inputAmount: 5_000_000_000n,
      outputAddress: 'bcrt1qtrader0002',
      outputAmount: 2_000_000_000n,
      changeAddress: 'bcrt1qminer0003',
      changeAmount: 2_999_990_000n,
      fee: 10_000n,
      blockHeight: maturity + 2,
    });

    const lines = (await readFile(config.outputPath, 'utf8')).split('\n');
    expect(lines).toEqual([
      result.txid,
      'bcrt1qminer0001',
      '50',
      'bcrt1qtrader0002',
      '20',
      'bcrt1qminer0003',
      '29.9999',
      '0.0001',
      String(maturity + 2),
      result.blockHash,
      '',
    ]);
    expect(result.txid).toMatch(/^[0-9a-f]{64}$/);
    expect(result.blockHash).toMatch(/^[0-9a-f]{64}$/);
  });

  it('inspects the mempool before mining the confirmation block', async () => {
    await new PaymentWalkthrough(config, node.connect).run();

    const methods = node.calls.map((call) => call.method);
    const mempoolAt = methods.indexOf('getmempoolentry');
    expect(methods[mempoolAt - 1]).toBe('sendtoaddress');
    expect(methods[mempoolAt + 1]).toBe('generatetoaddress');
    expect(methods.filter((method) => method === 'generatetoaddress')).toHaveLength(maturity + 2);
  });

  it('produces the same report shape on a second run against the same node', async () => {
    await new PaymentWalkthrough(config, node.connect).run();
    const second = await new PaymentWalkthrough(config, node.connect).run();

    const lines = (await readFile(config.outputPath, 'utf8')).split('\n');
    expect(lines).toHaveLength(11);
    expect(lines[0]).toBe(second.txid);
    expect(lines[8]).toBe(String(second.blockHeight));
    expect(second.fee).toBe(10_000n);
  });

  it('pays through the generic send RPC when configured', async () => {
    const result = await new PaymentWalkthrough({ ...config, sendMethod: 'send' }, node.connect).run();

    expect(node.calls.some((call) => call.method === 'send' && call.wallet === 'Miner')).toBe(true);
    expect(result.outputAmount).toBe(2_000_000_000n);
  });

  it('aborts when the node is unreachable', async () => {
    node.failNext('getblockchaininfo', new Error('connect ECONNREFUSED 127.0.0.1:18443'));

    await expect(new PaymentWalkthrough(config, node.connect).run()).rejects.toMatchObject({
      kind: 'rpc',
      message: 'Bitcoin Core not accessible at http://127.0.0.1:18443: connect ECONNREFUSED 127.0.0.1:18443',
    });
    expect(node.calls).toHaveLength(1);
  });
});
