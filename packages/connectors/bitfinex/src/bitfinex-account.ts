import { EventEmitter } from 'events';
import {
  ConfigurationError,
  createLogger,
  type AccountType,
  type CashAmount,
  type Holding,
  type Instrument,
  type SymbolMapper,
} from '@cryptobridge/core';
import type { BitfinexPosition, BitfinexWallet } from './types.js';

const logger = createLogger('BitfinexAccount');

export interface AccountSource {
  getPositions(): Promise<BitfinexPosition[]>;
  getWallets(): Promise<BitfinexWallet[]>;
}

export interface BitfinexAccountConfig {
  source: AccountSource;
  symbolMapper: SymbolMapper;
  accountType: AccountType;
  /** Reported as-is for cash accounts */
  liveHoldings: Holding[];
  /** Quote currency assumed when a pair cannot be split */
  accountCurrency: string;
}

const WALLET_TYPES: Record<AccountType, string> = {
  cash: 'exchange',
  margin: 'margin',
};

/**
 * Holdings and cash balances, recomputed on every query.
 *
 * Events:
 * - 'message': (BrokerageMessage)
 */
export class BitfinexAccount extends EventEmitter {
  private readonly source: AccountSource;
  private readonly symbolMapper: SymbolMapper;
  private readonly accountType: AccountType;
  private readonly liveHoldings: Holding[];
  private readonly accountCurrency: string;

  constructor(config: BitfinexAccountConfig) {
    super();
    this.source = config.source;
    this.symbolMapper = config.symbolMapper;
    this.accountType = config.accountType;
    this.liveHoldings = config.liveHoldings;
    this.accountCurrency = config.accountCurrency;
  }

  async getHoldings(): Promise<Holding[]> {
    if (this.accountType === 'cash') {
      return this.liveHoldings.map((holding) => ({ ...holding }));
    }

    const positions = await this.source.getPositions();
    const holdings: Holding[] = [];

    // Trading pairs carry the "t" prefix; funding entries ("f") are not holdings
    for (const position of positions) {
      if (position.amount === 0 || !position.symbol.startsWith('t')) {
        continue;
      }

      const symbol = this.lookupSymbol(position.symbol);
      if (!symbol) {
        continue;
      }

      holdings.push({
        symbol,
        quantity: position.amount,
        averagePrice: position.basePrice,
        unrealizedPnl: position.profitLoss ?? undefined,
      });
    }

    logger.debug({ count: holdings.length }, 'Fetched holdings');
    return holdings;
  }

  /**
   * Wallet balances of this account's wallet type. Margin accounts also
   * carry the currency swap implied by each open crypto position: the base
   * currency is credited with the quantity and the quote currency debited
   * with quantity * average price.
   */
  async getCashBalance(): Promise<CashAmount[]> {
    const [wallets, holdings] = await Promise.all([
      this.source.getWallets(),
      this.accountType === 'margin' ? this.getHoldings() : Promise.resolve([]),
    ]);

    const balances = new Map<string, number>();
    const credit = (currency: string, amount: number): void => {
      balances.set(currency, (balances.get(currency) ?? 0) + amount);
    };

    const walletType = WALLET_TYPES[this.accountType];
    for (const wallet of wallets) {
      if (wallet.walletType !== walletType || wallet.balance <= 0) {
        continue;
      }
      credit(this.symbolMapper.getHostCurrency(wallet.currency), wallet.balance);
    }

    for (const holding of holdings) {
      if (holding.symbol.securityType !== 'crypto') {
        continue;
      }
      const pair = this.symbolMapper.decomposePair(holding.symbol, this.accountCurrency);
      credit(pair.base, holding.quantity);
      credit(pair.quote, -holding.quantity * holding.averagePrice);
    }

    return [...balances].map(([currency, amount]) => ({ currency, amount }));
  }

  private lookupSymbol(venueSymbol: string): Instrument | null {
    try {
      return this.symbolMapper.getHostSymbol(venueSymbol);
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      logger.warn({ venueSymbol }, 'Skipping position with unknown symbol');
      this.emit('message', {
        type: 'warning',
        code: 'InvalidPosition',
        message: `Skipping position ${venueSymbol}: ${error.message}`,
      });
      return null;
    }
  }
}
