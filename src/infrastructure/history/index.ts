export {
  HttpHistoryClient,
  buildMessagesUrl,
  toMessageEvent,
  isRetriableStatus,
  parseRetryAfterMs,
} from './http-history-client.js';
export type { HttpHistoryClientOptions } from './http-history-client.js';
