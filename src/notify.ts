/**
 * Alert delivery to Telegram and Slack.
 * Delivery is best-effort: failures are logged and reported as `false`, never thrown.
 */

import { createLogger } from "./logger";
import { errorMessage } from "./errors";
import { formatUtc, truncate } from "./utils";
import type { ClassificationResult, Post } from "./types";

const TELEGRAM_API = "https://api.telegram.org/bot";
// Telegram rejects messages over 4096 characters
const TELEGRAM_MAX_LENGTH = 4000;

const log = createLogger("notify");

// ── Channels ──────────────────────────────────────────────

export interface TelegramChannel {
	kind: "telegram";
	enabled: boolean;
	botToken: string;
	chatId: string;
}

export interface SlackChannel {
	kind: "slack";
	enabled: boolean;
	webhookUrl: string;
}

export type Channel = TelegramChannel | SlackChannel;

export function channelName(channel: Channel): string {
	return channel.kind === "telegram" ? `telegram:${channel.chatId}` : "slack";
}

export interface NotificationMessage {
	post?: Post;
	classification?: ClassificationResult;
	text: string;
	channel: Channel;
}

// ── Formatting ────────────────────────────────────────────

export function escapeHtml(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;");
}

export function sourceLabel(post: Post): string {
	if (post.category === "community") return `Reddit: r/${post.community ?? "unknown"}`;
	return `Reddit: ${post.category}`;
}

/** Plain-text alert body. */
export function formatAlert(post: Post, classification?: ClassificationResult): string {
	const lines = [
		`${sourceLabel(post)} from ${post.author} at ${formatUtc(post.createdUtc)}:`,
	];
	if (post.title) lines.push(post.title);
	lines.push(post.url);

	if (classification) {
		const { sentiment, summary } = classification;
		lines.push("", `Sentiment: ${sentiment.score}/100 (${sentiment.direction})`, `Summary: ${summary}`);
	}
	return lines.join("\n");
}

function formatTelegramAlert(post: Post, classification?: ClassificationResult): string {
	let text = `<b>${escapeHtml(sourceLabel(post))}</b> from ${escapeHtml(post.author)} at ${formatUtc(post.createdUtc)}\n`;
	text += `<a href="${escapeHtml(post.url)}">${escapeHtml(post.title || post.url)}</a>\n`;

	if (classification) {
		const { sentiment, summary } = classification;
		text += `\nSentiment: ${sentiment.score}/100 (${sentiment.direction})\n`;
		text += `Summary: ${escapeHtml(summary)}\n`;
	}
	return text;
}

export function buildMessage(channel: Channel, post: Post, classification?: ClassificationResult): NotificationMessage {
	const text = channel.kind === "telegram"
		? formatTelegramAlert(post, classification)
		: formatAlert(post, classification);
	return { post, classification, text, channel };
}

// ── Delivery ──────────────────────────────────────────────

export interface NotifierOptions {
	timeoutMs?: number;
	fetchImpl?: typeof fetch;
}

export class Notifier {
	private readonly timeoutMs: number;
	private readonly fetchImpl: typeof fetch;

	constructor(private readonly channels: Channel[], options: NotifierOptions = {}) {
		this.timeoutMs = options.timeoutMs ?? 15000;
		this.fetchImpl = options.fetchImpl ?? fetch;
	}

	/** Delivers one message. A disabled channel is a successful no-op. */
	async send(message: NotificationMessage, channel: Channel = message.channel): Promise<boolean> {
		if (!channel.enabled) {
			log.debug(`${channelName(channel)} disabled, not sending`);
			return true;
		}

		const request = channel.kind === "telegram"
			? {
				url: `${TELEGRAM_API}${channel.botToken}/sendMessage`,
				body: {
					chat_id: channel.chatId,
					text: truncate(message.text, TELEGRAM_MAX_LENGTH),
					parse_mode: "HTML",
					disable_web_page_preview: true,
				},
			}
			: { url: channel.webhookUrl, body: { text: message.text } };

		try {
			const response = await this.fetchImpl(request.url, {
				method: "POST",
				headers: { "Content-Type": "application/json" },
				body: JSON.stringify(request.body),
				signal: AbortSignal.timeout(this.timeoutMs),
			});

			if (!response.ok) {
				const detail = await response.text().catch(() => "");
				log.error(`${channelName(channel)} API error: ${response.status} ${detail}`.trim());
				return false;
			}
			return true;
		} catch (error) {
			log.error(`failed to send to ${channelName(channel)}: ${errorMessage(error)}`);
			return false;
		}
	}

	/** Sends the alert for `post` to every channel; returns the number delivered. */
	async broadcast(post: Post, classification?: ClassificationResult): Promise<number> {
		let delivered = 0;
		for (const channel of this.channels) {
			const ok = await this.send(buildMessage(channel, post, classification));
			if (ok && channel.enabled) delivered++;
		}
		return delivered;
	}

	async sendHeartbeat(text: string): Promise<number> {
		let delivered = 0;
		for (const channel of this.channels) {
			const body = channel.kind === "telegram" ? escapeHtml(text) : text;
			if (await this.send({ text: body, channel }) && channel.enabled) delivered++;
		}
		return delivered;
	}
}
