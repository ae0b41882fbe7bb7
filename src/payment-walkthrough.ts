import path from 'path';
import { formatBtc } from './amounts.js';
import type { DemoConfig } from './config.js';
import { DemoError, errorMessage, rpcErrorCode } from './errors.js';
import { BlockMiner } from './miner.js';
import { dispatchPayment } from './payments.js';
import { TransactionReconciler, type ReconciliationResult } from './reconciler.js';
import { writeReport } from './report-writer.js';
import type { NodeConnector, NodeRpc } from './rpc-client.js';
import { sleep } from './sleep.js';
import { WalletProvisioner } from './wallet-provisioner.js';

export const MINING_REWARD_LABEL = 'Mining Reward';
export const RECEIVED_LABEL = 'Received';
export const PAYMENT_LABEL = 'Payment to Trader';

export class PaymentWalkthrough {
  private baseClient: NodeRpc;

  constructor(
    private readonly config: DemoConfig,
    private readonly connect: NodeConnector,
  ) {
    this.baseClient = connect();
  }

  async checkConnection(): Promise<void> {
    console.log('🔗 Checking Bitcoin Core connection...');
    try {
      const info = await this.baseClient.getBlockchainInfo();
      console.log(` Bitcoin Core is ready! chain: ${info.chain}, blocks: ${info.blocks}, best block: ${info.bestBlockHash}`);
    } catch (error) {
      throw new DemoError({
        message: `Bitcoin Core not accessible at ${this.config.rpcUrl}: ${errorMessage(error)}`,
        kind: 'rpc',
        code: rpcErrorCode(error),
        cause: error,
      });
    }
  }

  async run(): Promise<ReconciliationResult> {
    await this.checkConnection();

    console.log('\n=== Creating/Loading Wallets ===');
    const provisioner = new WalletProvisioner(this.baseClient, this.config.unloadDelayMs);
    await provisioner.ensureWallet(this.config.minerWallet);
    await sleep(this.config.walletSetupPauseMs);
    await provisioner.ensureWallet(this.config.traderWallet);

    console.log('\n=== Generating Mining Rewards ===');
    const miner = this.connect(this.config.minerWallet);
    const minerAddress = await miner.getNewAddress(MINING_REWARD_LABEL);
    console.log(` Generated Miner address: ${minerAddress}`);

    const blockMiner = new BlockMiner(this.baseClient, miner);
    const { blocksMined, balance } = await blockMiner.mineUntilPositiveBalance(minerAddress);

    console.log('\n=== Balance Explanation ===');
    console.log(` It took ${blocksMined} blocks to get a positive spendable balance because:`);
    console.log('   1. Each block reward is 50 BTC in regtest mode');
    console.log('   2. Block rewards require 100 confirmations to become spendable (mature)');
    console.log('   3. So the first reward only becomes spendable once 100 more blocks sit on top of it');

    console.log('\n=== Final Miner Balance ===');
    console.log(` Miner wallet balance: ${formatBtc(balance)} BTC`);

    console.log('\n=== Setting up Trader Wallet ===');
    const trader = this.connect(this.config.traderWallet);
    const traderAddress = await trader.getNewAddress(RECEIVED_LABEL);
    console.log(` Generated Trader address: ${traderAddress}`);

    console.log('\n=== Sending Transaction ===');
    const txid = await dispatchPayment(
      this.config.sendMethod,
      miner,
      traderAddress,
      this.config.sendAmount,
      PAYMENT_LABEL,
    );
    console.log(` Transaction sent! TXID: ${txid}`);

    console.log('\n=== Checking Mempool ===');
    const mempoolEntry = await this.baseClient.getMempoolEntry(txid);
    console.log(` Mempool entry: ${JSON.stringify(mempoolEntry, null, 2)}`);

    console.log('\n=== Confirming Transaction ===');
    const [confirmationHash] = await blockMiner.mineBlocks(minerAddress, 1);
    console.log(` Confirmation block mined: ${confirmationHash}`);

    console.log('\n=== Extracting Transaction Details ===');
    const result = await new TransactionReconciler(this.baseClient).reconcile(txid, confirmationHash);

    console.log('\n=== Writing Output to File ===');
    await writeReport(this.config.outputPath, result);
    console.log(` Output written to ${path.resolve(this.config.outputPath)}`);

    this.printSummary(result);
    return result;
  }

  private printSummary(result: ReconciliationResult): void {
    console.log('\n=== Summary ===');
    console.log(`Transaction ID: ${result.txid}`);
    console.log(`Miner's Input Address: ${result.inputAddress}`);
    console.log(`Miner's Input Amount: ${formatBtc(result.inputAmount)} BTC`);
    console.log(`Trader's Output Address: ${result.outputAddress}`);
    console.log(`Trader's Output Amount: ${formatBtc(result.outputAmount)} BTC`);
    console.log(`Miner's Change Address: ${result.changeAddress}`);
    console.log(`Miner's Change Amount: ${formatBtc(result.changeAmount)} BTC`);
    console.log(`Transaction Fees: ${formatBtc(result.fee)} BTC`);
    console.log(`Block Height: ${result.blockHeight}`);
    console.log(`Block Hash: ${result.blockHash}`);
  }
}
