export {
	type CreateOrderResult,
	type OrderIntent,
	OrderType,
} from "./types.js";
export {
	DEFAULT_LIMIT_PRICE_PCT,
	DEFAULT_ORDER_TIMEOUT_MS,
	type OrderIntentInput,
	orderIntentSchema,
	parseOrderIntent,
} from "./order-intent.js";
export {
	type ClientOrderIdFactory,
	ClientOrderIdIssuer,
	randomClientOrderId,
} from "./client-order-ids.js";
