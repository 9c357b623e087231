/**
 * Declarative descriptions of the durable broker resources.
 *
 * Provisioning from these specs is idempotent: applying the same spec
 * twice succeeds both times and changes nothing the second time.
 */

export type AckPolicy = 'explicit';

/** `new` = only entries added after the consumer was created; `all` = replay from the start. */
export type DeliverPolicy = 'new' | 'all';

export interface StreamSpec {
  readonly name: string;
  readonly subjects: readonly string[];
}

export interface ConsumerSpec {
  readonly durableName: string;
  readonly ackPolicy: AckPolicy;
  readonly deliverPolicy: DeliverPolicy;
}

export const FILE_EVENTS_SUBJECT = 'file.events';

export const FILES_STREAM: StreamSpec = {
  name: 'FILES',
  subjects: [FILE_EVENTS_SUBJECT],
};

export const FILE_MONITOR_CONSUMER: ConsumerSpec = {
  durableName: 'file-monitor',
  ackPolicy: 'explicit',
  deliverPolicy: 'new',
};

export const PUBLISHER_IDENTITY = 'file-events-publisher';
export const MONITOR_IDENTITY = 'file-events-monitor';

/** Hash of subject → stream name, written when a stream is created. */
export const SUBJECT_BINDINGS_KEY = 'broker:subjects';
