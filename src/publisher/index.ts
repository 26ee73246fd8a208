export {
  OutboxPublisher,
  type OutboxPublisherOptions,
  type OutboxEntry,
} from './outbox-publisher.js';
