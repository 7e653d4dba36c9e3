// ============================================================
// History backfill: pages the candle endpoint into bars.
// One page per advance of the iterator; the sequence ends on the
// end boundary, on an empty page, or on a failed request.
// ============================================================

import { EventEmitter } from 'events';
import {
  createLogger,
  resolutionToMs,
  roundDown,
  type Bar,
  type BrokerageMessage,
  type HistoryRequest,
  type Instrument,
  type Resolution,
  type SymbolMapper,
} from '@cryptobridge/core';
import type { BitfinexCandle } from './types.js';

const logger = createLogger('BitfinexHistory');

export const RESOLUTION_TOKENS: Partial<Record<Resolution, string>> = {
  minute: '1m',
  hour: '1h',
  daily: '1D',
};

export interface CandleSource {
  getCandles(resolutionToken: string, venueSymbol: string, startMs: number, endMs: number): Promise<BitfinexCandle[]>;
}

export interface HistoryProviderConfig {
  source: CandleSource;
  symbolMapper: SymbolMapper;
}

interface PageQuery {
  symbol: Instrument;
  venueSymbol: string;
  resolutionToken: string;
  periodMs: number;
  startMs: number;
  endMs: number;
}

type PagerState = 'active' | 'exhausted' | 'failed';

const DONE: IteratorResult<Bar> = { done: true, value: undefined };

/**
 * Lazy, non-restartable bar sequence. Concurrent next() calls are served
 * in order; a failed page request rejects that call and ends the sequence.
 */
export class CandlePager implements AsyncIterableIterator<Bar> {
  private state: PagerState = 'active';
  private buffer: Bar[] = [];
  private cursor: number;
  private lastTimestamp = Number.NEGATIVE_INFINITY;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly source: CandleSource,
    private readonly query: PageQuery,
    private readonly onMessage: (message: BrokerageMessage) => void,
  ) {
    this.cursor = query.startMs;
  }

  get status(): PagerState {
    return this.state;
  }

  next(): Promise<IteratorResult<Bar>> {
    const turn = this.queue.then(() => this.advance());
    this.queue = turn.then(
      () => undefined,
      () => undefined,
    );
    return turn;
  }

  return(): Promise<IteratorResult<Bar>> {
    if (this.state === 'active') {
      this.state = 'exhausted';
    }
    this.buffer = [];
    return Promise.resolve(DONE);
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<Bar> {
    return this;
  }

  private async advance(): Promise<IteratorResult<Bar>> {
    const buffered = this.buffer.shift();
    if (buffered) {
      return { done: false, value: buffered };
    }

    if (this.state !== 'active') {
      return DONE;
    }

    if (this.cursor >= this.query.endMs) {
      this.state = 'exhausted';
      return DONE;
    }

    const { venueSymbol, resolutionToken, endMs } = this.query;
    let candles: BitfinexCandle[];
    try {
      candles = await this.source.getCandles(resolutionToken, venueSymbol, this.cursor, endMs);
    } catch (error) {
      this.state = 'failed';
      throw error;
    }

    // The venue includes the bar opening at the end boundary; it is still forming
    const page = candles.filter(
      (candle) => candle.timestamp >= this.cursor && candle.timestamp < endMs && candle.timestamp > this.lastTimestamp,
    );

    const last = page.at(-1);
    if (!last) {
      this.state = 'exhausted';
      this.onMessage({
        type: 'warning',
        code: 'NoHistoricalData',
        message:
          `Exchange returned no data for ${venueSymbol} on history request ` +
          `from ${new Date(this.cursor).toISOString()} to ${new Date(endMs).toISOString()}`,
      });
      return DONE;
    }

    logger.debug({ venueSymbol, from: this.cursor, bars: page.length }, 'Fetched candle page');
    this.lastTimestamp = last.timestamp;
    this.cursor = last.timestamp + this.query.periodMs;
    this.buffer = page.map((candle) => this.toBar(candle));

    const first = this.buffer.shift();
    return first ? { done: false, value: first } : DONE;
  }

  private toBar(candle: BitfinexCandle): Bar {
    const { symbol, periodMs } = this.query;
    return {
      symbol,
      time: candle.timestamp,
      endTime: candle.timestamp + periodMs,
      periodMs,
      open: candle.open,
      high: candle.high,
      low: candle.low,
      close: candle.close,
      volume: candle.volume,
      value: candle.close,
    };
  }
}

async function* emptyBars(): AsyncGenerator<Bar> {
  // no bars
}

/**
 * Events:
 * - 'message': (BrokerageMessage)
 */
export class BitfinexHistoryProvider extends EventEmitter {
  private readonly source: CandleSource;
  private readonly symbolMapper: SymbolMapper;
  private loggedTradeOnly = false;

  constructor(config: HistoryProviderConfig) {
    super();
    this.source = config.source;
    this.symbolMapper = config.symbolMapper;
  }

  /**
   * Host-facing history query. Returns null for request shapes the venue
   * cannot serve and an empty sequence for an inverted date range.
   */
  getHistory(request: HistoryRequest): AsyncIterable<Bar> | null {
    const { symbol, resolution, tickType, startUtc, endUtc } = request;

    if (!this.checkSecurityType(symbol) || !this.checkResolution(resolution)) {
      return null;
    }

    if (!this.checkDateRange(startUtc, endUtc)) {
      return emptyBars();
    }

    if (tickType !== 'trade') {
      if (!this.loggedTradeOnly) {
        this.loggedTradeOnly = true;
        logger.error({ tickType }, 'Bitfinex history only supports trade bars');
      }
      this.publish({
        type: 'warning',
        code: 'InvalidTickType',
        message: `${tickType} tick type not supported, no history returned`,
      });
      return null;
    }

    return this.fetchBars(symbol, resolution, startUtc, endUtc);
  }

  /**
   * Trade bars in [floor(start), floor(end)) at the given resolution.
   * Unsupported inputs give an empty sequence with a warning; an unknown
   * symbol throws ConfigurationError.
   */
  fetchBars(symbol: Instrument, resolution: Resolution, startUtc: Date, endUtc: Date): AsyncIterableIterator<Bar> {
    if (!this.checkSecurityType(symbol) || !this.checkResolution(resolution) || !this.checkDateRange(startUtc, endUtc)) {
      return emptyBars();
    }

    const venueSymbol = this.symbolMapper.getVenueSymbol(symbol);
    const resolutionToken = RESOLUTION_TOKENS[resolution];
    if (!resolutionToken) {
      return emptyBars();
    }

    return new CandlePager(
      this.source,
      {
        symbol,
        venueSymbol,
        resolutionToken,
        periodMs: resolutionToMs(resolution),
        startMs: roundDown(startUtc.getTime(), resolution),
        endMs: roundDown(endUtc.getTime(), resolution),
      },
      (message) => this.publish(message),
    );
  }

  private checkSecurityType(symbol: Instrument): boolean {
    if (symbol.securityType === 'crypto') {
      return true;
    }
    this.publish({
      type: 'warning',
      code: 'InvalidSecurityType',
      message: `${symbol.securityType} security type not supported, no history returned`,
    });
    return false;
  }

  private checkResolution(resolution: Resolution): boolean {
    if (RESOLUTION_TOKENS[resolution] !== undefined) {
      return true;
    }
    this.publish({
      type: 'warning',
      code: 'InvalidResolution',
      message: `${resolution} resolution not supported, no history returned`,
    });
    return false;
  }

  private checkDateRange(startUtc: Date, endUtc: Date): boolean {
    if (startUtc.getTime() < endUtc.getTime()) {
      return true;
    }
    this.publish({
      type: 'warning',
      code: 'InvalidDateRange',
      message: 'The history request start date must precede the end date, no history returned',
    });
    return false;
  }

  private publish(message: BrokerageMessage): void {
    this.emit('message', message);
  }
}
