export {
	type Balance,
	type LimitOrderRequest,
	type MarketOrderRequest,
	type OrderHandle,
	type OrderState,
	type ProductInfo,
	type Venue,
	DEFAULT_TERMINAL_STATUSES,
	OrderSide,
	OrderStatus,
	POST_ONLY_CROSS_REASON,
	TimeInForce,
} from "./types.js";
export { normalizeOrderState, normalizeProduct, normalizeStatus } from "./normalize.js";
export { CoinbaseVenue } from "./coinbase-venue.js";
export {
	type PaperCall,
	type PaperProduct,
	type PaperVenueConfig,
	PaperVenue,
} from "./paper-venue.js";
