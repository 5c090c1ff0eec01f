import { MalformedResponseError } from "./errors";
import { LlmClient } from "./llm/client";
import { loadPromptTemplate, renderTemplate, type PromptName } from "./llm/prompts";
import { truncate } from "./utils";
import type { ClassificationResult, SentimentDirection, SentimentScore, SignificanceVerdict } from "./types";

export interface ClassifierOptions {
	sentimentCharLimit: number;
	summaryCharLimit: number;
	loadTemplate?: (name: PromptName) => string;
}

const DIRECTIONS: readonly SentimentDirection[] = ["bullish", "bearish"];

function isDirection(value: unknown): value is SentimentDirection {
	return typeof value === "string" && DIRECTIONS.some((d) => d === value);
}

/**
 * Reads the leading YES/NO token. Anything else is "not significant" with the
 * raw text kept as rationale, so ambiguous output is never escalated.
 */
export function parseSignificance(response: string): SignificanceVerdict {
	const text = response.trim();
	const match = text.match(/^[\s*_"'`]*([A-Za-z]+)\b[\s*_"'`]*[.,:;!-]*\s*([\s\S]*)$/);
	const token = match?.[1].toUpperCase();

	if (match && (token === "YES" || token === "NO")) {
		return { isSignificant: token === "YES", rationale: match[2].trim() };
	}
	return { isSignificant: false, rationale: text };
}

/** Accepts exactly one JSON object with an integer `sentiment` in 0..100 and a known `direction`. */
export function parseSentiment(response: string): SentimentScore {
	const jsonMatch = response.match(/\{[\s\S]*\}/);
	if (!jsonMatch) {
		throw new MalformedResponseError("no JSON object in sentiment response", response);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(jsonMatch[0]);
	} catch (e) {
		throw new MalformedResponseError(`sentiment JSON parse error: ${e}`, response);
	}

	if (typeof parsed !== "object" || parsed === null || !("sentiment" in parsed) || !("direction" in parsed)) {
		throw new MalformedResponseError("sentiment response is missing sentiment or direction", response);
	}

	const { sentiment, direction } = parsed;
	if (typeof sentiment !== "number" || !Number.isInteger(sentiment) || sentiment < 0 || sentiment > 100) {
		throw new MalformedResponseError(`sentiment out of range: ${JSON.stringify(sentiment)}`, response);
	}
	if (!isDirection(direction)) {
		throw new MalformedResponseError(`unknown direction: ${JSON.stringify(direction)}`, response);
	}
	return { score: sentiment, direction };
}

/**
 * The three model-backed checks run on a post. Stateless between calls;
 * transport failures surface as ClassifierUnavailableError from LlmClient.
 */
export class Classifier {
	private readonly loadTemplate: (name: PromptName) => string;

	constructor(private readonly llm: LlmClient, private readonly options: ClassifierOptions) {
		this.loadTemplate = options.loadTemplate ?? ((name) => loadPromptTemplate(name));
	}

	async classifySignificance(content: string): Promise<SignificanceVerdict> {
		const prompt = renderTemplate(this.loadTemplate("significance"), { content });
		const response = await this.llm.complete({ prompt, maxTokens: 100, temperature: 0.2 });
		return parseSignificance(response);
	}

	async scoreSentiment(content: string): Promise<SentimentScore> {
		const prompt = renderTemplate(this.loadTemplate("sentiment"), {
			content,
			character_limit: this.options.sentimentCharLimit,
		});
		const maxTokens = Math.max(32, this.options.sentimentCharLimit);
		const response = await this.llm.complete({ prompt, maxTokens, temperature: 0.3 });
		return parseSentiment(response);
	}

	async summarize(content: string, characterLimit: number = this.options.summaryCharLimit): Promise<string> {
		const prompt = renderTemplate(this.loadTemplate("summarization"), {
			content,
			character_limit: characterLimit,
		});
		// ~4 characters per token, with headroom; the hard cap is the truncation below
		const maxTokens = Math.max(32, Math.ceil(characterLimit / 2));
		const response = await this.llm.complete({ prompt, maxTokens, temperature: 0.5 });
		return truncate(response.trim(), characterLimit);
	}

	/** Significance first; sentiment and summary only for significant posts. */
	async classify(content: string): Promise<ClassificationResult | null> {
		const significance = await this.classifySignificance(content);
		if (!significance.isSignificant) return null;

		const sentiment = await this.scoreSentiment(content);
		const summary = await this.summarize(content);
		return { significance, sentiment, summary };
	}
}
