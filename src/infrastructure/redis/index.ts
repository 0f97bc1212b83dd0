export {
  connectSubscription,
  openSubscription,
  ensureConsumerGroup,
  resolveStartId,
  rejectedStreamKey,
  RedisStreamSubscription,
} from './stream-subscription.js';
export type { BrokerMessage, Subscription, SubscriptionOptions } from './stream-subscription.js';
