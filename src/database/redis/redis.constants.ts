export const REDIS_CLIENT = 'REDIS_CLIENT';

export const SCAN_BATCH_SIZE = 200;
