export type {
	BatchCancelResult,
	CoinbaseAccount,
	CoinbaseClientConfig,
	CreateOrderBody,
	FetchFn,
	OrderConfiguration,
} from "./types.js";
export { COINBASE_API_HOST } from "./types.js";
export { CoinbaseClient } from "./client.js";
