import { NoOpMessageBus, type BrokerConfig, type ILogger, type IMessageBus } from '@pentad/core';
import { AmqpMessageBus } from './AmqpMessageBus.js';
import type { BrokerConnector } from './broker.js';

/**
 * Connect and declare topology, or fall back to the offline bus.
 * The choice is made once; callers never branch on connectivity afterwards.
 */
export async function createMessageBus(
  config: BrokerConfig,
  logger: ILogger,
  connector?: BrokerConnector
): Promise<IMessageBus> {
  const bus = new AmqpMessageBus(logger, connector);

  if ((await bus.connect(config)) === 'connected' && (await bus.declareTopology())) {
    return bus;
  }

  await bus.close();
  logger.warn('Message broker unavailable, running offline');
  return new NoOpMessageBus(logger);
}
