export { AmqpMessageBus } from './AmqpMessageBus.js';
export { createMessageBus } from './createMessageBus.js';
export { connectAmqp } from './broker.js';
export type {
  BrokerChannel,
  BrokerConnection,
  BrokerConnector,
  BrokerMessage,
  BrokerPublishOptions,
} from './broker.js';
