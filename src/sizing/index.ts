export {
	DEFAULT_BASE_PRECISION,
	DEFAULT_QUOTE_PRECISION,
	type LimitOrderSize,
	type LimitPrice,
	type LimitPricing,
	type Precision,
} from "./types.js";
export {
	DEFAULT_PRECISION,
	priceTick,
	quantize,
	quantizeBase,
	quantizePrice,
	quantizeQuote,
} from "./quantize.js";
export { computeLimitPrice, sizeLimitOrder, sizeMarketOrder } from "./order-sizer.js";
