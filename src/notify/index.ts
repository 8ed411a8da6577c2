export type { NotificationSink } from "./types.js";
export {
	REPORT_UNAVAILABLE_LIMIT,
	MAX_MESSAGE_LENGTH,
	type StatusReportInput,
	escapeHtml,
	statusEmoji,
	formatAvailabilityAlert,
	formatStatusReport,
	chunkMessage,
} from "./format.js";
export {
	TelegramBotApi,
	type TelegramBotApiConfig,
	type TelegramUpdate,
	TELEGRAM_API_BASE_URL,
} from "./telegram-api.js";
export { TelegramNotificationSink } from "./telegram-sink.js";
