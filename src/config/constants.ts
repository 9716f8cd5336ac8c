export const UPLOAD_EVENTS = {
    TASK_STARTED: 'task:started',
    TASK_COMPLETED: 'task:completed',
    TASK_FAILED: 'task:failed',
    TASK_CRASHED: 'task:crashed',
    STATS_UPDATED: 'stats:updated',
    BATCH_UNAUTHORIZED: 'batch:unauthorized',
    QUEUE_EMPTY: 'queue:empty'
} as const;

export const AUTH_HEADER = 'X-Auth-Token';

/** Query appended when overwrite is off: the server rejects duplicates quietly. */
export const QUIET_QUERY = 'quiet=true';

/** Body text of the 500 response the service sends for an existing remote file. */
export const FILE_EXISTS_MARKER = 'File already exists';

export const BYTES_PER_MB = 1024 * 1024;

export const ENV_ENDPOINT = 'BULK_UPLOAD_ENDPOINT';
export const ENV_TOKEN = 'BULK_UPLOAD_TOKEN';
