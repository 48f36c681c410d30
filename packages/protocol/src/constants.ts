export const DEFAULT_MAX_ATTEMPTS = 5;
export const DEFAULT_BASE_DELAY_MS = 500;
export const DEFAULT_MAX_DELAY_MS = 30_000;
export const DEFAULT_BATCH_CONCURRENCY = 8;
export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 100;
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
export const DEFAULT_API_BASE_URL = 'https://open.feishu.cn/open-apis';
/** UTC offset applied when a bare YYYY-MM-DD due date is expanded */
export const DEFAULT_DUE_OFFSET = '+08:00';
