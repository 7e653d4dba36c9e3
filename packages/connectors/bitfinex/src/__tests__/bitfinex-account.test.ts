import { describe, it, expect, vi } from 'vitest';

// Silence pino logger
vi.mock('pino', () => {
  const noop = () => {};
  const logger: Record<string, unknown> = {
    info: noop,
    warn: noop,
    error: noop,
    debug: noop,
    trace: noop,
    child: () => logger,
  };
  return { default: () => logger };
});

import type { AccountType, BrokerageMessage, Holding } from '@cryptobridge/core';
import { BitfinexAccount, type AccountSource } from '../bitfinex-account.js';
import { JsonSymbolMapper } from '../json-symbol-mapper.js';
import type { BitfinexPosition, BitfinexWallet } from '../types.js';
import { position, wallet } from './fixtures/venue-rows.js';

class FakeAccountSource implements AccountSource {
  positionCalls = 0;

  constructor(
    private readonly positions: BitfinexPosition[],
    private readonly wallets: BitfinexWallet[],
  ) {}

  async getPositions(): Promise<BitfinexPosition[]> {
    this.positionCalls++;
    return this.positions;
  }

  async getWallets(): Promise<BitfinexWallet[]> {
    return this.wallets;
  }
}

const LIVE_HOLDINGS: Holding[] = [
  { symbol: { value: 'BTCUSD', securityType: 'crypto', market: 'bitfinex' }, quantity: 0.25, averagePrice: 40_000 },
];

function createAccount(accountType: AccountType, source: FakeAccountSource): { account: BitfinexAccount; messages: BrokerageMessage[] } {
  const account = new BitfinexAccount({
    source,
    symbolMapper: new JsonSymbolMapper(),
    accountType,
    liveHoldings: LIVE_HOLDINGS,
    accountCurrency: 'USD',
  });
  const messages: BrokerageMessage[] = [];
  account.on('message', (message: BrokerageMessage) => messages.push(message));
  return { account, messages };
}

describe('holdings', () => {
  it('cash accounts report the configured live holdings without polling', async () => {
    const source = new FakeAccountSource([position('tETHUSD', 2, 100)], []);
    const { account } = createAccount('cash', source);

    expect(await account.getHoldings()).toEqual(LIVE_HOLDINGS);
    expect(source.positionCalls).toBe(0);
  });

  it('margin accounts report non-zero trading-pair positions', async () => {
    const source = new FakeAccountSource(
      [position('tETHUSD', 2, 100), position('tBTCUSD', 0, 40_000), position('fUSD', 500, 1)],
      [],
    );
    const { account } = createAccount('margin', source);

    expect(await account.getHoldings()).toEqual([
      {
        symbol: { value: 'ETHUSD', securityType: 'crypto', market: 'bitfinex' },
        quantity: 2,
        averagePrice: 100,
        unrealizedPnl: 1.25,
      },
    ]);
  });

  it('positions in unknown symbols are skipped with a warning', async () => {
    const source = new FakeAccountSource([position('tXYZUSD', 1, 5), position('tETHUSD', -1, 2000)], []);
    const { account, messages } = createAccount('margin', source);

    const holdings = await account.getHoldings();

    expect(holdings.map((h) => h.symbol.value)).toEqual(['ETHUSD']);
    expect(messages).toEqual([
      { type: 'warning', code: 'InvalidPosition', message: 'Skipping position tXYZUSD: Unknown venue symbol: tXYZUSD' },
    ]);
  });
});

describe('cash balance', () => {
  it('cash accounts sum positive exchange wallets only', async () => {
    const source = new FakeAccountSource(
      [],
      [wallet('exchange', 'USD', 50), wallet('exchange', 'UST', 10), wallet('margin', 'USD', 1000), wallet('exchange', 'BTC', 0)],
    );
    const { account } = createAccount('cash', source);

    expect(await account.getCashBalance()).toEqual([
      { currency: 'USD', amount: 50 },
      { currency: 'USDT', amount: 10 },
    ]);
  });

  it('margin accounts add the currency swap of each open position', async () => {
    // +2 ETH at 100 USD: ETH credited 2, USD debited 200, summed with the raw wallets
    const source = new FakeAccountSource(
      [position('tETHUSD', 2, 100)],
      [wallet('margin', 'USD', 1000), wallet('margin', 'ETH', 1), wallet('exchange', 'USD', 50)],
    );
    const { account } = createAccount('margin', source);

    expect(await account.getCashBalance()).toEqual([
      { currency: 'USD', amount: 800 },
      { currency: 'ETH', amount: 3 },
    ]);
  });

  it('swap legs create currencies with no wallet of their own', async () => {
    const source = new FakeAccountSource([position('tETHBTC', -4, 0.05)], []);
    const { account } = createAccount('margin', source);

    expect(await account.getCashBalance()).toEqual([
      { currency: 'ETH', amount: -4 },
      { currency: 'BTC', amount: 0.2 },
    ]);
  });
});
