export {
	COINBASE_PRIVATE_LIMIT,
	type RateLimiterConfig,
	TokenBucketRateLimiter,
} from "./rate-limiter.js";
