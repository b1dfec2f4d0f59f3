export { TokenBucketLimiter } from "./token-bucket.js";
export type {
  AcquireOptions,
  AcquireOutcome,
  LimiterStats,
  TokenBucketOptions,
} from "./types.js";
