import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { ClassifierUnavailableError, ConfigError, TimeoutError, errorMessage } from "../errors";
import { createLogger } from "../logger";
import { sleep, withTimeout } from "../utils";
import type { LlmConfig } from "../types";

const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 1000;
const MAX_RETRY_AFTER_MS = 60000;

const DEFAULT_MODELS = {
	openai: "gpt-4o-mini",
	anthropic: "claude-3-5-haiku-20241022",
} as const;

const log = createLogger("llm");

export interface CompletionRequest {
	prompt: string;
	maxTokens: number;
	temperature: number;
}

/** One round trip to a model. Implementations do not retry. */
export interface CompletionProvider {
	readonly model: string;
	complete(request: CompletionRequest): Promise<string>;
}

export class OpenAIProvider implements CompletionProvider {
	private readonly client: OpenAI;

	constructor(apiKey: string, readonly model: string, timeoutMs: number) {
		this.client = new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 });
	}

	async complete({ prompt, maxTokens, temperature }: CompletionRequest): Promise<string> {
		// reasoning models take different params
		const isReasoningModel = /^(gpt-5|o1|o3|o4)/.test(this.model);
		const params: ChatCompletionCreateParamsNonStreaming = isReasoningModel
			? {
				model: this.model,
				max_completion_tokens: maxTokens,
				messages: [{ role: "user", content: prompt }],
			}
			: {
				model: this.model,
				max_tokens: maxTokens,
				temperature,
				messages: [{ role: "user", content: prompt }],
			};

		const response = await this.client.chat.completions.create(params);
		return response.choices[0]?.message?.content || "";
	}
}

export class AnthropicProvider implements CompletionProvider {
	private readonly client: Anthropic;

	constructor(apiKey: string, readonly model: string, timeoutMs: number) {
		this.client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 0 });
	}

	async complete({ prompt, maxTokens, temperature }: CompletionRequest): Promise<string> {
		const response = await this.client.messages.create({
			model: this.model,
			max_tokens: maxTokens,
			temperature,
			messages: [{ role: "user", content: prompt }],
		});

		for (const block of response.content) {
			if (block.type === "text") return block.text;
		}
		return "";
	}
}

export function createProvider(
	config: LlmConfig,
	env: NodeJS.ProcessEnv = process.env,
	timeoutMs: number = DEFAULT_TIMEOUT_MS
): CompletionProvider {
	if (config.provider === "anthropic") {
		const apiKey = env.ANTHROPIC_API_KEY;
		if (!apiKey) throw new ConfigError("ANTHROPIC_API_KEY environment variable is required");
		return new AnthropicProvider(apiKey, config.model || DEFAULT_MODELS.anthropic, timeoutMs);
	}

	const apiKey = env.OPENAI_API_KEY;
	if (!apiKey) throw new ConfigError("OPENAI_API_KEY environment variable is required");
	return new OpenAIProvider(apiKey, config.model || DEFAULT_MODELS.openai, timeoutMs);
}

function statusOf(error: unknown): number | undefined {
	if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
		return error.status;
	}
	return undefined;
}

function retryAfterMs(error: unknown): number | null {
	if (typeof error !== "object" || error === null || !("headers" in error)) return null;
	const headers = error.headers;
	if (typeof headers !== "object" || headers === null || !("retry-after" in headers)) return null;
	const value = Number(headers["retry-after"]);
	return Number.isFinite(value) && value >= 0 ? Math.min(value * 1000, MAX_RETRY_AFTER_MS) : null;
}

export function isRetryableError(error: unknown): boolean {
	if (error instanceof TimeoutError) return true;

	const status = statusOf(error);
	if (status !== undefined && (status === 408 || status === 429 || status >= 500)) return true;

	const name = error instanceof Error ? error.name : "";
	if (name === "APIConnectionError" || name === "APIConnectionTimeoutError") return true;

	const message = errorMessage(error).toLowerCase();
	return (
		message.includes("timeout") ||
		message.includes("timed out") ||
		message.includes("econnreset") ||
		message.includes("etimedout") ||
		message.includes("overloaded")
	);
}

export interface LlmClientOptions {
	maxAttempts?: number;
	baseDelayMs?: number;
	timeoutMs?: number;
	sleep?: (ms: number) => Promise<void>;
}

/**
 * Wraps a provider with a per-attempt timeout and exponential backoff.
 * Throws ClassifierUnavailableError once attempts run out, or immediately
 * on an error that retrying cannot fix.
 */
export class LlmClient {
	private readonly maxAttempts: number;
	private readonly baseDelayMs: number;
	private readonly timeoutMs: number;
	private readonly wait: (ms: number) => Promise<void>;

	constructor(private readonly provider: CompletionProvider, options: LlmClientOptions = {}) {
		this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
		this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.wait = options.sleep ?? sleep;
	}

	get model(): string {
		return this.provider.model;
	}

	async complete(request: CompletionRequest): Promise<string> {
		const model = this.provider.model;

		for (let attempt = 1; ; attempt++) {
			try {
				const text = await withTimeout(this.provider.complete(request), this.timeoutMs, `[${model}]`);
				return text.trim();
			} catch (error) {
				const message = errorMessage(error);

				if (!isRetryableError(error)) {
					log.error(`FAIL [${model}]: ${message} (not retryable)`);
					throw new ClassifierUnavailableError(`${model}: ${message}`, attempt, error);
				}
				if (attempt >= this.maxAttempts) {
					log.error(`FAIL [${model}] after ${attempt} attempts: ${message}`);
					throw new ClassifierUnavailableError(`${model} unavailable after ${attempt} attempts: ${message}`, attempt, error);
				}

				const backoff = this.baseDelayMs * 2 ** (attempt - 1);
				const delay = statusOf(error) === 429 ? Math.max(retryAfterMs(error) ?? 0, backoff) : backoff;
				log.warn(`RETRY ${attempt}/${this.maxAttempts} [${model}] in ${delay}ms: ${message}`);
				await this.wait(delay);
			}
		}
	}
}
