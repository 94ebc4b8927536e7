/**
 * @tickline/domain - Shared error taxonomy, status tables and wire helpers
 */

export {
	ClientError,
	type ClientErrorOptions,
	isClientError,
	isVendorError,
	ProtocolError,
	type ProtocolErrorKind,
	SerializationError,
	TransportError,
	ValidationError,
	VendorError,
} from "./errors.js";

export {
	DATA_BASE_URL,
	DataFeed,
	isLive,
	TRADING_BASE_URLS,
	TradingEnvironment,
} from "./environment.js";

export {
	FlexibleNumberSchema,
	nullableList,
	OptionalFlexibleNumberSchema,
	parseFlexibleNumber,
} from "./numbers.js";

export {
	type RealtimeErrorName,
	type ResourceFamily,
	realtimeErrorName,
	type VendorErrorCode,
	vendorErrorCode,
} from "./status-codes.js";
