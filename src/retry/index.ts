export {
  DEFAULT_RETRY_POLICY,
  computeRetryDelay,
  sleep,
  withRetry,
} from "./retryPolicy";
