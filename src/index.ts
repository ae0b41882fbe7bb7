// src/index.ts
import 'dotenv/config';
import { loadConfig } from './config.js';
import { formatDemoError } from './errors.js';
import { PaymentWalkthrough } from './payment-walkthrough.js';
import { createNodeConnector } from './rpc-client.js';

const BANNER = `
╔═══════════════════════════════════════╗
║  🔗 Regtest Payment Walkthrough       ║
║  Mine, pay and reconcile on regtest   ║
╚═══════════════════════════════════════╝
`;

async function main() {
  console.log(BANNER);

  try {
    const config = loadConfig();
    const walkthrough = new PaymentWalkthrough(config, createNodeConnector(config));

    const startTime = Date.now();
    await walkthrough.run();
    const endTime = Date.now();

    const duration = ((endTime - startTime) / 1000).toFixed(2);
    console.log(` Total time: ${duration} seconds`);
  } catch (error) {
    console.error('\n❌ Walkthrough failed:', formatDemoError(error));
    process.exit(1);
  }
}

process.on('SIGINT', () => {
  console.log(' Shutting down...');
  process.exit(0);
});

main().catch((error: unknown) => {
  console.error(formatDemoError(error));
  process.exit(1);
});
