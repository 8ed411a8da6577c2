/**
 * Minimal Telegram Bot API client: sendMessage and getUpdates over HTTPS.
 *
 * Every call carries one deadline covering headers and body. Replies are validated with zod; anything
 * unexpected becomes a NotificationDeliveryError. The token only ever appears
 * in the request URL and is never logged.
 */

import { withTimeout } from "../lib/concurrency/timeout.js";
import { validate, z } from "../lib/validation/index.js";
import { NotificationDeliveryError, toError } from "../shared/errors.js";
import { type FetchFn, defaultFetch } from "../shared/fetch.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Secret } from "../shared/secret.js";

export const TELEGRAM_API_BASE_URL = "https://api.telegram.org";

export interface TelegramBotApiConfig {
	readonly token: Secret;
	/** Deadline for sendMessage; getUpdates adds its long-poll window on top. */
	readonly requestTimeoutMs: number;
	readonly baseUrl?: string;
	readonly fetchFn?: FetchFn;
}

const envelopeSchema = z.object({
	ok: z.boolean(),
	result: z.unknown().optional(),
	description: z.string().optional(),
	error_code: z.number().optional(),
});

const updateSchema = z.object({
	update_id: z.number().int(),
	message: z
		.object({
			chat: z.object({ id: z.union([z.number(), z.string()]) }),
			text: z.string().optional(),
		})
		.optional(),
});

export type TelegramUpdate = z.infer<typeof updateSchema>;

export class TelegramBotApi {
	private readonly token: Secret;
	private readonly requestTimeoutMs: number;
	private readonly baseUrl: string;
	private readonly fetchFn: FetchFn;

	constructor(config: TelegramBotApiConfig) {
		this.token = config.token;
		this.requestTimeoutMs = config.requestTimeoutMs;
		this.baseUrl = config.baseUrl ?? TELEGRAM_API_BASE_URL;
		this.fetchFn = config.fetchFn ?? defaultFetch;
	}

	async sendMessage(
		chatId: string,
		text: string,
	): Promise<Result<void, NotificationDeliveryError>> {
		const result = await this.call(
			"sendMessage",
			{ chat_id: chatId, text, parse_mode: "HTML", disable_web_page_preview: true },
			this.requestTimeoutMs,
		);
		return result.ok ? ok(undefined) : result;
	}

	/**
	 * Long-poll for new messages. `offset` is the last seen update_id + 1;
	 * an aborted `signal` ends the poll early with an error result.
	 */
	async getUpdates(
		offset: number | undefined,
		timeoutSec: number,
		signal?: AbortSignal,
	): Promise<Result<TelegramUpdate[], NotificationDeliveryError>> {
		const result = await this.call(
			"getUpdates",
			{
				...(offset !== undefined && { offset }),
				timeout: timeoutSec,
				allowed_updates: ["message"],
			},
			timeoutSec * 1000 + this.requestTimeoutMs,
			signal,
		);
		if (!result.ok) return result;

		const updates = validate(z.array(updateSchema), result.value);
		if (!updates.ok) {
			return err(
				new NotificationDeliveryError(
					`getUpdates returned unexpected data: ${updates.error.describe()}`,
					{ method: "getUpdates" },
				),
			);
		}
		return ok(updates.value);
	}

	private async call(
		method: string,
		payload: Record<string, unknown>,
		timeoutMs: number,
		signal?: AbortSignal,
	): Promise<Result<unknown, NotificationDeliveryError>> {
		const controller = new AbortController();
		const onAbort = (): void => controller.abort();
		signal?.addEventListener("abort", onAbort, { once: true });
		if (signal?.aborted) controller.abort();

		try {
			const response = await withTimeout(
				this.fetchFn(`${this.baseUrl}/bot${this.token.reveal()}/${method}`, {
					method: "POST",
					headers: { "content-type": "application/json" },
					body: JSON.stringify(payload),
					signal: controller.signal,
				}).then(async (res) => ({ status: res.status, text: await res.text() })),
				timeoutMs,
				() =>
					new NotificationDeliveryError(`Telegram ${method} timed out after ${timeoutMs}ms`, {
						method,
					}),
			);
			const envelope = validate(envelopeSchema, parseJson(response.text));
			if (!envelope.ok) {
				return err(
					new NotificationDeliveryError(`Telegram ${method} returned HTTP ${response.status}`, {
						method,
						status: response.status,
					}),
				);
			}
			if (!envelope.value.ok) {
				return err(
					new NotificationDeliveryError(
						`Telegram ${method} failed: ${envelope.value.description ?? "no description"}`,
						{ method, status: response.status, errorCode: envelope.value.error_code },
					),
				);
			}
			return ok(envelope.value.result);
		} catch (error: unknown) {
			if (error instanceof NotificationDeliveryError) return err(error);
			const cause = toError(error);
			return err(
				new NotificationDeliveryError(`Telegram ${method} request failed: ${cause.message}`, {
					method,
					cause,
				}),
			);
		} finally {
			signal?.removeEventListener("abort", onAbort);
			controller.abort();
		}
	}
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}
