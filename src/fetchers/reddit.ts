/**
 * Reddit fetcher: new submissions from watched accounts and flair-filtered
 * subreddit searches, read from Reddit's public JSON listings.
 */

import { FetchError, errorMessage } from "../errors";
import type { Post, PostCategory } from "../types";

const REDDIT_BASE = "https://www.reddit.com";
const DEFAULT_USER_AGENT = "reddit-market-watch/0.1";
const LISTING_LIMIT = 25;

export type AccountCategory = Exclude<PostCategory, "community">;

export interface PostSource {
	/** Posts by `account` created after `since` (epoch seconds), oldest first. */
	fetchAccountPosts(account: string, category: AccountCategory, since: number): Promise<Post[]>;
	/** Posts in `community` with flair `flair` created after `since`, oldest first. */
	fetchCommunityPosts(community: string, flair: string, since: number): Promise<Post[]>;
	/** Link karma of `author`, or null when the account is gone. */
	fetchKarma(author: string): Promise<number | null>;
}

export interface RedditFetcherOptions {
	userAgent?: string;
	timeoutMs?: number;
	baseUrl?: string;
	fetchImpl?: typeof fetch;
}

export interface RedditSubmission {
	id: string;
	author: string;
	title: string;
	selftext: string;
	created_utc: number;
	permalink: string;
	subreddit?: string;
	link_flair_text?: string;
}

type Json = Record<string, unknown>;

function isJson(value: unknown): value is Json {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toSubmission(value: unknown): RedditSubmission | null {
	if (!isJson(value) || !isJson(value.data)) return null;
	const data = value.data;
	if (typeof data.id !== "string" || typeof data.created_utc !== "number") return null;

	return {
		id: data.id,
		author: typeof data.author === "string" ? data.author : "[deleted]",
		title: typeof data.title === "string" ? data.title : "",
		selftext: typeof data.selftext === "string" ? data.selftext : "",
		created_utc: data.created_utc,
		permalink: typeof data.permalink === "string" ? data.permalink : `/comments/${data.id}`,
		subreddit: typeof data.subreddit === "string" ? data.subreddit : undefined,
		link_flair_text: typeof data.link_flair_text === "string" ? data.link_flair_text : undefined,
	};
}

export function parseListing(body: unknown): RedditSubmission[] {
	if (!isJson(body) || !isJson(body.data) || !Array.isArray(body.data.children)) {
		throw new FetchError("unexpected listing payload");
	}
	const submissions: RedditSubmission[] = [];
	for (const child of body.data.children) {
		const submission = toSubmission(child);
		if (submission) submissions.push(submission);
	}
	return submissions;
}

export class RedditFetcher implements PostSource {
	private readonly userAgent: string;
	private readonly timeoutMs: number;
	private readonly baseUrl: string;
	private readonly fetchImpl: typeof fetch;

	constructor(options: RedditFetcherOptions = {}) {
		this.userAgent = options.userAgent || DEFAULT_USER_AGENT;
		this.timeoutMs = options.timeoutMs ?? 30000;
		this.baseUrl = options.baseUrl ?? REDDIT_BASE;
		this.fetchImpl = options.fetchImpl ?? fetch;
	}

	async fetchAccountPosts(account: string, category: AccountCategory, since: number): Promise<Post[]> {
		const url = `${this.baseUrl}/user/${encodeURIComponent(account)}/submitted.json?sort=new&limit=${LISTING_LIMIT}`;
		const body = await this.getJson(url, `u/${account}`);
		if (body === null) return [];

		return this.toPosts(parseListing(body), category, since);
	}

	async fetchCommunityPosts(community: string, flair: string, since: number): Promise<Post[]> {
		const query = encodeURIComponent(`flair:"${flair}"`);
		const url = `${this.baseUrl}/r/${encodeURIComponent(community)}/search.json?q=${query}&restrict_sr=1&sort=new&t=week&limit=${LISTING_LIMIT}`;
		const body = await this.getJson(url, `r/${community}`);
		if (body === null) return [];

		const wanted = flair.toLowerCase();
		const matching = parseListing(body).filter((s) => s.link_flair_text?.toLowerCase() === wanted);
		return this.toPosts(matching, "community", since);
	}

	async fetchKarma(author: string): Promise<number | null> {
		const body = await this.getJson(`${this.baseUrl}/user/${encodeURIComponent(author)}/about.json`, `u/${author}`);
		if (!isJson(body) || !isJson(body.data)) return null;
		const karma = body.data.link_karma;
		return typeof karma === "number" ? karma : null;
	}

	private toPosts(submissions: RedditSubmission[], category: PostCategory, since: number): Post[] {
		return submissions
			.filter((s) => s.created_utc > since)
			.sort((a, b) => a.created_utc - b.created_utc)
			.map((s) => ({
				id: s.id,
				author: s.author,
				title: s.title,
				body: s.selftext,
				createdUtc: s.created_utc,
				category,
				community: s.subreddit,
				flair: s.link_flair_text,
				url: `${REDDIT_BASE}${s.permalink}`,
			}));
	}

	/** GET a JSON document; null on 404 (missing user or subreddit). */
	private async getJson(url: string, label: string): Promise<unknown> {
		let response: Response;
		try {
			response = await this.fetchImpl(url, {
				headers: { "User-Agent": this.userAgent },
				signal: AbortSignal.timeout(this.timeoutMs),
			});
		} catch (error) {
			const reason = error instanceof Error && error.name === "TimeoutError"
				? `timeout after ${this.timeoutMs}ms`
				: errorMessage(error);
			throw new FetchError(`${label}: request failed: ${reason}`);
		}

		if (response.status === 404) return null;
		if (!response.ok) {
			throw new FetchError(`${label}: HTTP ${response.status}`, response.status);
		}
		return response.json();
	}
}
