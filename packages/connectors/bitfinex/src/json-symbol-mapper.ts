import { readFileSync } from 'fs';
import { z } from 'zod';
import {
  ConfigurationError,
  type CurrencyPair,
  type Instrument,
  type SymbolMapper,
} from '@cryptobridge/core';

const symbolEntrySchema = z.object({
  ticker: z.string().min(1),
  venueSymbol: z.string().min(1),
  securityType: z.enum(['crypto', 'forex', 'equity', 'future', 'option']),
  base: z.string().min(1),
  quote: z.string().min(1),
});

export const symbolDataSchema = z.object({
  market: z.string().min(1),
  currencyAliases: z.record(z.string()).default({}),
  symbols: z.array(symbolEntrySchema),
});

export type SymbolData = z.infer<typeof symbolDataSchema>;
type SymbolEntry = z.infer<typeof symbolEntrySchema>;

const DEFAULT_DATA_FILE = new URL('../data/symbols.json', import.meta.url);

/**
 * Load and validate a symbol data file.
 */
export function loadSymbolData(file: URL | string = DEFAULT_DATA_FILE): SymbolData {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read symbol data ${String(file)}: ${reason}`, 'bitfinex');
  }

  const result = symbolDataSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid symbol data ${String(file)}: ${issues}`, 'bitfinex');
  }
  return result.data;
}

/**
 * Symbol mapper over a static symbol table.
 */
export class JsonSymbolMapper implements SymbolMapper {
  readonly market: string;
  private readonly byTicker = new Map<string, SymbolEntry>();
  private readonly byVenueSymbol = new Map<string, SymbolEntry>();
  private readonly currencyAliases: Record<string, string>;

  constructor(data: SymbolData = loadSymbolData()) {
    this.market = data.market;
    this.currencyAliases = data.currencyAliases;
    for (const entry of data.symbols) {
      this.byTicker.set(this.tickerKey(entry.ticker, entry.securityType), entry);
      this.byVenueSymbol.set(entry.venueSymbol, entry);
    }
  }

  getVenueSymbol(symbol: Instrument): string {
    const entry = this.findHostEntry(symbol);
    if (!entry) {
      throw new ConfigurationError(`Unknown symbol: ${symbol.value} (${symbol.securityType}, ${symbol.market})`, 'bitfinex');
    }
    return entry.venueSymbol;
  }

  getHostSymbol(venueSymbol: string): Instrument {
    const entry = this.byVenueSymbol.get(venueSymbol);
    if (!entry) {
      throw new ConfigurationError(`Unknown venue symbol: ${venueSymbol}`, 'bitfinex');
    }
    return { value: entry.ticker, securityType: entry.securityType, market: this.market };
  }

  isKnownHostSymbol(symbol: Instrument): boolean {
    return this.findHostEntry(symbol) !== undefined;
  }

  isKnownVenueSymbol(venueSymbol: string): boolean {
    return this.byVenueSymbol.has(venueSymbol);
  }

  getHostCurrency(venueCurrency: string): string {
    return this.currencyAliases[venueCurrency] ?? venueCurrency;
  }

  /**
   * Base and quote currency of a pair. Symbols missing from the table are
   * split on the default quote currency when they end with it.
   */
  decomposePair(symbol: Instrument, defaultQuoteCurrency: string): CurrencyPair {
    const entry = this.findHostEntry(symbol);
    if (entry) {
      return { base: entry.base, quote: entry.quote };
    }

    const ticker = symbol.value;
    if (ticker.length > defaultQuoteCurrency.length && ticker.endsWith(defaultQuoteCurrency)) {
      return { base: ticker.slice(0, -defaultQuoteCurrency.length), quote: defaultQuoteCurrency };
    }
    throw new ConfigurationError(`Cannot decompose ${ticker} into base and quote currencies`, 'bitfinex');
  }

  private findHostEntry(symbol: Instrument): SymbolEntry | undefined {
    if (symbol.market !== this.market) {
      return undefined;
    }
    return this.byTicker.get(this.tickerKey(symbol.value, symbol.securityType));
  }

  private tickerKey(ticker: string, securityType: string): string {
    return `${securityType}:${ticker}`;
  }
}
