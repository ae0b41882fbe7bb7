import { DemoError, errorMessage, rpcErrorCode } from './errors.js';
import type { NodeRpc } from './rpc-client.js';
import { sleep } from './sleep.js';

export class WalletProvisioner {
  constructor(
    private readonly node: NodeRpc,
    private readonly unloadDelayMs: number,
  ) {}

  /**
   * Leaves `name` loaded on the node: unload, load, create, and one last load
   * in case another process created it in between. Safe to repeat.
   */
  async ensureWallet(name: string): Promise<void> {
    try {
      await this.node.unloadWallet(name);
      console.log(`   Unloaded: ${name}`);
    } catch {
      // not loaded yet
    }

    // let the node release the wallet's database lock
    await sleep(this.unloadDelayMs);

    try {
      await this.node.loadWallet(name);
      console.log(` Wallet '${name}' loaded successfully`);
      return;
    } catch {
      console.log(` Creating new wallet '${name}'`);
    }

    try {
      await this.node.createWallet(name);
      console.log(` Wallet '${name}' created successfully`);
      return;
    } catch (createError) {
      console.log(`   Wallet creation failed, trying to load again: ${errorMessage(createError)}`);
    }

    try {
      await this.node.loadWallet(name);
    } catch (error) {
      throw new DemoError({
        message: `Could not load or create wallet '${name}': ${errorMessage(error)}`,
        kind: 'wallet',
        code: rpcErrorCode(error),
        cause: error,
      });
    }
    console.log(` Wallet '${name}' loaded after retry`);
  }
}
