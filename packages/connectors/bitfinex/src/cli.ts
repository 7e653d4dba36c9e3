#!/usr/bin/env node
// ============================================================
// CLI: operator commands against a Bitfinex account
// Commands: orders, holdings, balances, watch
// ============================================================

import { Command } from 'commander';
import { pathToFileURL } from 'node:url';
import { loadConfig, type BrokerageMessage, type OrderEvent } from '@cryptobridge/core';
import { BitfinexBrokerage } from './bitfinex-connector.js';

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

async function run(action: (brokerage: BitfinexBrokerage) => Promise<void>): Promise<void> {
  try {
    const brokerage = BitfinexBrokerage.fromConfig(loadConfig());
    brokerage.onMessage((message: BrokerageMessage) => {
      console.error(`[${message.type.toUpperCase()}] ${message.code}: ${message.message}`);
    });
    await action(brokerage);
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

const program = new Command();

program
  .name('cryptobridge-bitfinex')
  .description('Inspect a Bitfinex account through the connector')
  .version('0.1.0');

// --- orders command ---
program
  .command('orders')
  .description('List open orders of the configured account type')
  .action(async () => {
    await run(async (brokerage) => {
      printJson(await brokerage.getOpenOrders());
    });
  });

// --- holdings command ---
program
  .command('holdings')
  .description('List holdings (margin positions, or the configured live holdings for cash accounts)')
  .action(async () => {
    await run(async (brokerage) => {
      printJson(await brokerage.getAccountHoldings());
    });
  });

// --- balances command ---
program
  .command('balances')
  .description('List cash balances per currency')
  .action(async () => {
    await run(async (brokerage) => {
      printJson(await brokerage.getCashBalance());
    });
  });

// --- watch command ---
program
  .command('watch')
  .description('Connect the order stream and print order events until interrupted')
  .action(async () => {
    await run(async (brokerage) => {
      brokerage.onOrderEvent((event: OrderEvent) => {
        console.log(JSON.stringify(event));
      });

      const shutdown = (): void => {
        brokerage.disconnect().then(
          () => process.exit(0),
          (error: unknown) => {
            console.error('Error during shutdown:', error instanceof Error ? error.message : error);
            process.exit(1);
          },
        );
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);

      await brokerage.connect();
      console.log('Connected. Watching order events (Ctrl+C to stop)...');
    });
  });

export { program };

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  program.parse();
}
