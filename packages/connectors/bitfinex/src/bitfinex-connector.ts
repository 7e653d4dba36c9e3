import { EventEmitter } from 'events';
import {
  ConfigurationError,
  TokenBucket,
  createLogger,
  type Bar,
  type Brokerage,
  type BrokerageMessage,
  type CashAmount,
  type ConnectorConfig,
  type HistoryRequest,
  type Holding,
  type Instrument,
  type Order,
  type OrderEvent,
  type StartupCheck,
  type SymbolMapper,
} from '@cryptobridge/core';
import { BitfinexApi } from './bitfinex-api.js';
import { BitfinexAccount } from './bitfinex-account.js';
import { BitfinexHistoryProvider } from './bitfinex-history.js';
import type { StreamEvent } from './bitfinex-messages.js';
import { BitfinexOrderManager } from './bitfinex-order-manager.js';
import { BitfinexSession, type SessionDisconnect } from './bitfinex-session.js';
import { JsonSymbolMapper } from './json-symbol-mapper.js';

const logger = createLogger('BitfinexBrokerage');

export interface BitfinexBrokerageConfig extends Omit<ConnectorConfig, 'logLevel'> {
  symbolMapper?: SymbolMapper;
  /** Runs once before the first connection */
  startupCheck?: StartupCheck;
  /** Quote currency assumed for pairs missing from the symbol table */
  accountCurrency?: string;
}

/**
 * Bitfinex implementation of the host brokerage contract.
 *
 * Events:
 * - 'order_event': (OrderEvent)
 * - 'message': (BrokerageMessage)
 * - 'connected': () - stream authenticated (also after a reconnect)
 * - 'disconnected': (SessionDisconnect)
 */
export class BitfinexBrokerage extends EventEmitter implements Brokerage {
  public readonly venue = 'bitfinex';
  private readonly symbolMapper: SymbolMapper;
  private readonly api: BitfinexApi;
  private readonly session: BitfinexSession;
  private readonly orders: BitfinexOrderManager;
  private readonly account: BitfinexAccount;
  private readonly history: BitfinexHistoryProvider;
  private readonly startupCheck?: StartupCheck;
  private startupCheckRun: Promise<void> | null = null;
  private hasAuthenticated = false;

  constructor(config: BitfinexBrokerageConfig) {
    super();

    if (!config.apiKey || !config.apiSecret) {
      throw new ConfigurationError('Bitfinex API key and secret are required', 'bitfinex');
    }

    this.symbolMapper = config.symbolMapper ?? new JsonSymbolMapper();
    this.startupCheck = config.startupCheck;

    this.api = new BitfinexApi({
      restUrl: config.restUrl,
      apiKey: config.apiKey,
      apiSecret: config.apiSecret,
      rateLimiter: new TokenBucket({
        name: 'bitfinex-rest',
        capacity: config.restRateLimit.capacity,
        refillIntervalMs: config.restRateLimit.intervalMs,
      }),
    });

    this.session = new BitfinexSession({
      wsUrl: config.wsUrl,
      apiKey: config.apiKey,
      apiSecret: config.apiSecret,
      connectRateLimiter: new TokenBucket({
        name: 'bitfinex-connect',
        capacity: config.connectRateLimit.capacity,
        refillIntervalMs: config.connectRateLimit.intervalMs,
      }),
      authTimeoutMs: config.authTimeoutMs,
    });

    this.orders = new BitfinexOrderManager({
      transport: this.session,
      openOrders: this.api,
      symbolMapper: this.symbolMapper,
      accountType: config.accountType,
      orderAckTimeoutMs: config.orderAckTimeoutMs,
    });

    this.account = new BitfinexAccount({
      source: this.api,
      symbolMapper: this.symbolMapper,
      accountType: config.accountType,
      liveHoldings: config.liveHoldings,
      accountCurrency: config.accountCurrency ?? 'USD',
    });

    this.history = new BitfinexHistoryProvider({ source: this.api, symbolMapper: this.symbolMapper });

    this.wire();
  }

  static fromConfig(config: ConnectorConfig, options: Pick<BitfinexBrokerageConfig, 'symbolMapper' | 'startupCheck'> = {}): BitfinexBrokerage {
    return new BitfinexBrokerage({ ...config, ...options });
  }

  get isConnected(): boolean {
    return this.session.isAuthenticated;
  }

  async connect(): Promise<void> {
    if (this.startupCheck) {
      if (!this.startupCheckRun) {
        this.startupCheckRun = this.startupCheck();
      }
      await this.startupCheckRun;
    }
    await this.session.connect();
  }

  async disconnect(): Promise<void> {
    this.session.disconnect();
  }

  placeOrder(order: Order): boolean {
    return this.orders.place(order);
  }

  updateOrder(order: Order): boolean {
    return this.orders.update(order);
  }

  cancelOrder(order: Order): boolean {
    return this.orders.cancel(order);
  }

  getOpenOrders(): Promise<Order[]> {
    return this.orders.reconcileOpenOrders();
  }

  getAccountHoldings(): Promise<Holding[]> {
    return this.account.getHoldings();
  }

  getCashBalance(): Promise<CashAmount[]> {
    return this.account.getCashBalance();
  }

  getHistory(request: HistoryRequest): AsyncIterable<Bar> | null {
    return this.history.getHistory(request);
  }

  /**
   * Known symbols of this market, excluding universe placeholders.
   */
  canSubscribe(symbol: Instrument): boolean {
    return (
      symbol.market === this.symbolMapper.market &&
      !symbol.value.includes('UNIVERSE') &&
      this.symbolMapper.isKnownHostSymbol(symbol)
    );
  }

  onOrderEvent(callback: (event: OrderEvent) => void): void {
    this.on('order_event', callback);
  }

  onMessage(callback: (message: BrokerageMessage) => void): void {
    this.on('message', callback);
  }

  private wire(): void {
    this.session.on('event', (event: StreamEvent) => this.orders.handleStreamEvent(event));

    this.session.on('authenticated', () => {
      if (this.hasAuthenticated) {
        this.publish({ type: 'reconnect', code: 'Reconnected', message: 'Bitfinex stream reconnected' });
        this.reconcileAfterReconnect();
      }
      this.hasAuthenticated = true;
      this.emit('connected');
    });

    this.session.on('auth_failed', (reason: string) => {
      this.publish({ type: 'error', code: 'AuthFailed', message: `Bitfinex authentication failed: ${reason}` });
    });

    this.session.on('disconnected', (info: SessionDisconnect) => {
      this.orders.handleDisconnect(info.explicit);
      if (!info.explicit) {
        this.publish({ type: 'disconnect', code: 'Disconnected', message: `Bitfinex stream lost: ${info.reason}` });
      }
      this.emit('disconnected', info);
    });

    this.orders.on('order_event', (event: OrderEvent) => this.emit('order_event', event));
    this.orders.on('message', (message: BrokerageMessage) => this.publish(message));
    this.account.on('message', (message: BrokerageMessage) => this.publish(message));
    this.history.on('message', (message: BrokerageMessage) => this.publish(message));
  }

  private reconcileAfterReconnect(): void {
    this.orders.reconcileOpenOrders().then(
      (open) => logger.info({ open: open.length }, 'Reconciled open orders after reconnect'),
      (error: unknown) => {
        const reason = error instanceof Error ? error.message : String(error);
        this.publish({ type: 'error', code: 'VenueError', message: `Open order reconciliation failed: ${reason}` });
      },
    );
  }

  private publish(message: BrokerageMessage): void {
    const fields = { code: message.code };
    switch (message.type) {
      case 'error':
        logger.error(fields, message.message);
        break;
      case 'warning':
      case 'disconnect':
        logger.warn(fields, message.message);
        break;
      default:
        logger.info(fields, message.message);
    }
    this.emit('message', message);
  }
}
