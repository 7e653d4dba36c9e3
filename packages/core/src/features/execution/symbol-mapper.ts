import type { Instrument } from '../../shared/protocol.js';

export interface CurrencyPair {
  base: string;
  quote: string;
}

/**
 * Bidirectional mapping between host instruments and venue symbols.
 * Lookups of unknown symbols throw ConfigurationError.
 */
export interface SymbolMapper {
  readonly market: string;
  getVenueSymbol(symbol: Instrument): string;
  getHostSymbol(venueSymbol: string): Instrument;
  isKnownHostSymbol(symbol: Instrument): boolean;
  isKnownVenueSymbol(venueSymbol: string): boolean;
  /** Host currency code for a venue currency code */
  getHostCurrency(venueCurrency: string): string;
  decomposePair(symbol: Instrument, defaultQuoteCurrency: string): CurrencyPair;
}
