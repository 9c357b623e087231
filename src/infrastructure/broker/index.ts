export {
  BrokerConnection,
  BrokerConnectError,
  connectBroker,
  createRedisClient,
  isTransientBrokerError,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_COMMAND_TIMEOUT_MS,
} from './connection.js';
export type {
  ClientTimeouts,
  ConnectDeps,
  ConnectFailureReason,
  ConnectOptions,
  ConnectResult,
  ConnectionState,
  RedisClientFactory,
} from './connection.js';
export { ensureStream, ensureConsumer, probeStream, probeConsumer, resolveStream } from './provisioner.js';
export type { ProbeResult } from './provisioner.js';
export { publish } from './publisher.js';
export { PullSubscription } from './pull-subscription.js';
export type { StreamMessage } from './pull-subscription.js';
export {
  FILE_EVENTS_SUBJECT,
  FILES_STREAM,
  FILE_MONITOR_CONSUMER,
  PUBLISHER_IDENTITY,
  MONITOR_IDENTITY,
  SUBJECT_BINDINGS_KEY,
} from './topology.js';
export type { AckPolicy, ConsumerSpec, DeliverPolicy, StreamSpec } from './topology.js';
