import { formatBtc } from './amounts.js';
import type { NodeRpc } from './rpc-client.js';

export interface MiningOutcome {
  blocksMined: number;
  /** Spendable balance of the owning wallet, in satoshis. */
  balance: bigint;
}

export class BlockMiner {
  constructor(
    private readonly node: NodeRpc,
    private readonly wallet: NodeRpc,
  ) {}

  async mineBlocks(address: string, count: number): Promise<string[]> {
    return this.node.generateToAddress(count, address);
  }

  /**
   * Mines one block at a time to `address` until the wallet owning it reports
   * a positive balance. Coinbase outputs only count once they have matured, so
   * on a fresh chain this takes maturity depth + 1 blocks. There is no cap.
   */
  async mineUntilPositiveBalance(address: string): Promise<MiningOutcome> {
    let blocksMined = 0;
    let balance = 0n;

    while (balance <= 0n) {
      blocksMined += 1;
      const [hash] = await this.mineBlocks(address, 1);
      console.log(`   Mined block ${blocksMined}: ${hash}`);

      balance = await this.wallet.getBalance();
      console.log(`   Balance after ${blocksMined} blocks: ${formatBtc(balance)} BTC`);
    }

    return { blocksMined, balance };
  }
}
