/**
 * Injection tokens for the Redis module.
 *
 * Using string-based tokens (not class references) so each connection can
 * be provided as a separate ioredis instance without NestJS confusing them
 * with a single provider.
 */
export const REDIS_PUBLISHER_CLIENT = 'REDIS_PUBLISHER_CLIENT';
export const REDIS_SUBSCRIBER_CLIENT = 'REDIS_SUBSCRIBER_CLIENT';
export const REDIS_QUEUE_CLIENT = 'REDIS_QUEUE_CLIENT';
