export { MongoSubscriptionStore } from './store';
export type { MongoSubscriptionStoreConfig } from './store';
export { getSubscriptionModel } from './schema';
export type { ISubscriptionDocument } from './schema';
