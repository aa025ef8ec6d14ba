/**
 * AmqpMessageBus - live message bus over an AMQP broker
 */

import {
  ConnectivityError,
  EXCHANGE_NAMES,
  ROLE_QUEUES,
  TimeoutError,
  createEnvelope,
  decodeEnvelope,
  describeError,
  encodeEnvelope,
  withTimeout,
  type BrokerConfig,
  type ConnectionState,
  type ConsumeMode,
  type ExchangeName,
  type ILogger,
  type IMessageBus,
  type MessageHandler,
  type MessagePayload,
  type QueueDeclaration,
  type RoleId,
} from '@pentad/core';
import {
  connectAmqp,
  type BrokerChannel,
  type BrokerConnection,
  type BrokerConnector,
  type BrokerMessage,
} from './broker.js';

interface Subscription {
  queue: string;
  handler: MessageHandler;
  role: RoleId | null;
  consumerTag?: string;
}

export class AmqpMessageBus implements IMessageBus {
  private connection: BrokerConnection | null = null;
  private channel: BrokerChannel | null = null;
  private config: BrokerConfig | null = null;
  private state: ConnectionState = 'disconnected';
  private subscriptions: Subscription[] = [];
  private consuming: ConsumeMode | null = null;
  private releaseLoop: (() => void) | null = null;
  private closed = false;

  constructor(
    private readonly logger: ILogger,
    private readonly connector: BrokerConnector = connectAmqp
  ) {}

  isConnected(): boolean {
    return this.state === 'connected' && this.channel !== null;
  }

  async connect(config: BrokerConfig): Promise<ConnectionState> {
    if (this.isConnected()) {
      return this.state;
    }

    this.config = config;
    this.closed = false;

    const pending = this.connector(config);
    let connection: BrokerConnection | null = null;

    try {
      connection = await withTimeout(pending, config.connectTimeoutMs, 'Broker connection');
      this.watchConnection(connection);
      const channel = await withTimeout(
        connection.createChannel(),
        config.connectTimeoutMs,
        'Channel creation'
      );

      channel.on('error', (error) => {
        this.logger.warn('Broker channel error', { error: describeError(error) });
      });
      channel.on('close', () => {
        if (this.channel === channel) {
          this.handleConnectionLoss('Broker channel closed');
        }
      });

      this.connection = connection;
      this.channel = channel;
      this.state = 'connected';
      this.logger.info('Connected to message broker', {
        host: config.host,
        port: config.port,
        virtualHost: config.virtualHost,
      });
    } catch (error) {
      const failure = new ConnectivityError(
        `Could not connect to message broker at ${config.host}:${config.port}: ${describeError(error)}`,
        config.host
      );
      this.logger.warn(failure.message);
      this.state = 'disconnected';

      const opened = connection;
      if (opened !== null) {
        await this.quietly('Connection close', () => opened.close());
      } else if (error instanceof TimeoutError) {
        // The connector may still settle after the timeout
        void pending.then(
          (late) => {
            this.watchConnection(late);
            return this.quietly('Late connection close', () => late.close());
          },
          (lateError: unknown) => {
            this.logger.debug('Broker connection attempt failed after timeout', {
              error: describeError(lateError),
            });
          }
        );
      }
    }

    return this.state;
  }

  async declareTopology(): Promise<boolean> {
    const channel = this.channel;
    const config = this.config;
    if (channel === null || config === null || !this.isConnected()) {
      this.logger.warn('Cannot declare topology while disconnected');
      return false;
    }

    try {
      await withTimeout(
        (async () => {
          for (const exchange of EXCHANGE_NAMES) {
            await channel.assertExchange(exchange, config.exchanges[exchange] ?? 'topic', {
              durable: true,
            });
          }
          for (const declaration of Object.values(ROLE_QUEUES)) {
            await this.assertQueue(channel, declaration);
          }
        })(),
        config.connectTimeoutMs,
        'Topology declaration'
      );
      this.logger.info('Message topology declared', {
        exchanges: EXCHANGE_NAMES.length,
        queues: Object.keys(ROLE_QUEUES).length,
      });
      return true;
    } catch (error) {
      this.logger.warn('Topology declaration failed', { error: describeError(error) });
      return false;
    }
  }

  async declareQueue(declaration: QueueDeclaration): Promise<boolean> {
    const channel = this.channel;
    const config = this.config;
    if (channel === null || config === null || !this.isConnected()) {
      this.logger.warn('Cannot declare queue while disconnected', { queue: declaration.queue });
      return false;
    }

    try {
      await withTimeout(
        this.assertQueue(channel, declaration),
        config.connectTimeoutMs,
        `Queue declaration (${declaration.queue})`
      );
      return true;
    } catch (error) {
      this.logger.warn('Queue declaration failed', {
        queue: declaration.queue,
        error: describeError(error),
      });
      return false;
    }
  }

  publish(
    exchange: ExchangeName,
    routingKey: string,
    payload: MessagePayload,
    sourceRole: RoleId | null
  ): boolean {
    const channel = this.channel;
    if (channel === null || !this.isConnected()) {
      this.logger.warn('Message dropped, broker not connected', { exchange, routingKey });
      return false;
    }

    const envelope = createEnvelope(routingKey, payload, sourceRole);
    try {
      const flushed = channel.publish(
        exchange,
        routingKey,
        Buffer.from(encodeEnvelope(envelope), 'utf-8'),
        { persistent: true, contentType: 'application/json' }
      );
      if (flushed) {
        this.logger.debug('Message published', { exchange, routingKey });
      } else {
        // amqplib keeps the frame and sends it once the channel drains
        this.logger.debug('Message published under backpressure, write buffer full', {
          exchange,
          routingKey,
        });
      }
      return true;
    } catch (error) {
      this.logger.warn('Publish failed', { exchange, routingKey, error: describeError(error) });
      return false;
    }
  }

  subscribe(queue: string, handler: MessageHandler, role: RoleId | null): boolean {
    if (!this.isConnected()) {
      this.logger.warn('Cannot subscribe while disconnected', { queue });
      return false;
    }

    const subscription: Subscription = { queue, handler, role };
    this.subscriptions.push(subscription);

    // Late subscriptions join the running loop
    if (this.consuming !== null) {
      void this.attach(subscription);
    }
    return true;
  }

  async startConsuming(mode: ConsumeMode): Promise<void> {
    if (!this.isConnected()) {
      this.logger.warn('Cannot consume while disconnected');
      return;
    }
    if (this.consuming !== null) {
      this.logger.warn('Consumption loop already active', { mode: this.consuming });
      return;
    }

    this.consuming = mode;
    await Promise.all(this.subscriptions.map((subscription) => this.attach(subscription)));
    this.logger.info('Consuming messages', {
      mode,
      queues: this.subscriptions.map((subscription) => subscription.queue),
    });

    if (mode === 'background') {
      return;
    }

    if (!this.isConnected()) {
      this.consuming = null;
      return;
    }
    await new Promise<void>((resolve) => {
      this.releaseLoop = resolve;
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const channel = this.channel;
    const connection = this.connection;
    this.channel = null;
    this.connection = null;
    this.state = 'disconnected';

    if (channel !== null) {
      for (const { consumerTag } of this.subscriptions) {
        if (consumerTag !== undefined) {
          await this.quietly('Consumer cancel', () => channel.cancel(consumerTag));
        }
      }
      await this.quietly('Channel close', () => channel.close());
    }
    if (connection !== null) {
      await this.quietly('Connection close', () => connection.close());
    }

    this.subscriptions = [];
    this.release();
    this.logger.info('Message bus closed');
  }

  private async assertQueue(channel: BrokerChannel, declaration: QueueDeclaration): Promise<void> {
    await channel.assertQueue(declaration.queue, { durable: true });
    for (const binding of declaration.bindings) {
      await channel.bindQueue(declaration.queue, binding.exchange, binding.pattern);
    }
  }

  private async attach(subscription: Subscription): Promise<void> {
    const channel = this.channel;
    if (channel === null) {
      return;
    }

    try {
      const { consumerTag } = await channel.consume(
        subscription.queue,
        (message) => {
          void this.dispatch(channel, subscription, message);
        },
        { noAck: false }
      );
      subscription.consumerTag = consumerTag;
    } catch (error) {
      this.logger.warn('Failed to attach consumer', {
        queue: subscription.queue,
        error: describeError(error),
      });
    }
  }

  /**
   * Handler success acks; a decode or handler failure drops the message
   * without requeue
   */
  private async dispatch(
    channel: BrokerChannel,
    subscription: Subscription,
    message: BrokerMessage | null
  ): Promise<void> {
    if (message === null) {
      this.logger.warn('Consumer cancelled by broker', { queue: subscription.queue });
      return;
    }

    try {
      const envelope = decodeEnvelope(message.content.toString('utf-8'));
      await subscription.handler(envelope, subscription.role);
      channel.ack(message);
    } catch (error) {
      this.logger.warn('Message dropped', {
        queue: subscription.queue,
        routingKey: message.fields.routingKey,
        error: describeError(error),
      });
      try {
        channel.nack(message, false, false);
      } catch (nackError) {
        this.logger.warn('Could not reject message', { error: describeError(nackError) });
      }
    }
  }

  /**
   * Listeners go on as soon as the connection exists, so an 'error' event on
   * a connection that never became current is logged rather than thrown
   */
  private watchConnection(connection: BrokerConnection): void {
    connection.on('error', (error) => {
      this.logger.warn('Broker connection error', { error: describeError(error) });
    });
    connection.on('close', () => {
      if (this.connection === connection) {
        this.handleConnectionLoss('Broker connection closed');
      }
    });
  }

  private handleConnectionLoss(reason: string): void {
    if (this.closed || this.state === 'disconnected') {
      return;
    }

    this.state = 'disconnected';
    this.channel = null;
    this.connection = null;
    for (const subscription of this.subscriptions) {
      subscription.consumerTag = undefined;
    }
    this.logger.warn(reason);
    this.release();
  }

  private release(): void {
    const release = this.releaseLoop;
    this.releaseLoop = null;
    this.consuming = null;
    release?.();
  }

  private async quietly(operation: string, action: () => Promise<unknown>): Promise<void> {
    try {
      await action();
    } catch (error) {
      this.logger.debug(`${operation} failed`, { error: describeError(error) });
    }
  }
}
