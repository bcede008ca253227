/**
 * Friend registry exports
 */

export { FriendRegistry } from './friend-registry';
export type { FriendRegistryOptions } from './friend-registry';
