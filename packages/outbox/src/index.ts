export { RedisNotificationSink } from './sink';
export type { OutboxConnection, RedisNotificationSinkConfig } from './sink';
