/**
 * Poll cycle: fetch → dedup → (forward | classify → maybe forward).
 *
 * All mutable state lives in an OrchestratorState owned by the caller and
 * passed into each run, so a cycle can be driven directly from tests.
 */

import type { Classifier } from "./classifier";
import { MalformedResponseError, errorKind, errorMessage } from "./errors";
import type { AccountCategory, PostSource } from "./fetchers/reddit";
import { createLogger } from "./logger";
import type { Notifier } from "./notify";
import { CursorBook } from "./store/cursors";
import { SeenPostStore } from "./store/seen";
import { chunk, truncate } from "./utils";
import type { ClassificationResult, Post, RedditSourceConfig, SubredditWatchConfig } from "./types";

const log = createLogger("pipeline");

const RAW_LOG_LIMIT = 500;

interface FailureRecord {
	attempts: number;
	/** Failures caused by malformed model output; only these count toward the cap. */
	malformed: number;
	firstFailedAt: number;
}

export interface OrchestratorState {
	readonly store: SeenPostStore;
	readonly cursors: CursorBook;
	/** Posts whose processing failed and will be retried, keyed by post id. */
	readonly failures: Map<string, FailureRecord>;
	/** Posts recorded in the store whose outcome is not settled yet; never persisted. */
	readonly inFlight: Set<string>;
}

export function createState(store: SeenPostStore, cursors: CursorBook): OrchestratorState {
	return { store, cursors, failures: new Map(), inFlight: new Set() };
}

export interface CycleDeps {
	source: PostSource;
	classifier: Classifier;
	notifier: Notifier;
	now?: () => number;
}

export interface CycleSettings {
	reddit: RedditSourceConfig;
	concurrency: number;
	maxAttempts: number;
}

export interface CycleStats {
	fetched: number;
	skipped: number;
	notified: number;
	discarded: number;
	failed: number;
	fetchErrors: number;
}

type Outcome = "notified" | "discarded";

export function postContent(post: Post): string {
	return [post.title, post.body].map((part) => part.trim()).filter(Boolean).join("\n\n");
}

export function cursorKey(kind: "u" | "r", name: string): string {
	return `reddit:${kind}/${name.toLowerCase()}`;
}

/** Runs one full poll cycle over every configured source, one source at a time. */
export async function runCycle(state: OrchestratorState, deps: CycleDeps, settings: CycleSettings): Promise<CycleStats> {
	const stats: CycleStats = { fetched: 0, skipped: 0, notified: 0, discarded: 0, failed: 0, fetchErrors: 0 };
	const ctx = { state, deps, settings, stats, now: deps.now ?? Date.now };

	const accounts: Array<[string, AccountCategory]> = [
		...settings.reddit.reports.map((name): [string, AccountCategory] => [name, "report"]),
		...settings.reddit.general.map((name): [string, AccountCategory] => [name, "general"]),
	];

	for (const [account, category] of accounts) {
		await processSource(
			ctx,
			cursorKey("u", account),
			`u/${account}`,
			(since) => deps.source.fetchAccountPosts(account, category, since),
			(post) => (category === "report" ? forwardReport(ctx, post) : classifyGeneral(ctx, post))
		);
	}

	for (const [community, watch] of Object.entries(settings.reddit.subreddits)) {
		await processSource(
			ctx,
			cursorKey("r", community),
			`r/${community}`,
			(since) => deps.source.fetchCommunityPosts(community, watch.target_flair, since),
			(post) => scoreCommunity(ctx, post, watch)
		);
	}

	flushState(state);
	log.info(
		`cycle done: ${stats.fetched} fetched, ${stats.skipped} already seen, ${stats.notified} notified, ` +
		`${stats.discarded} discarded, ${stats.failed} failed, ${stats.fetchErrors} fetch errors`
	);
	return stats;
}

interface CycleContext {
	state: OrchestratorState;
	deps: CycleDeps;
	settings: CycleSettings;
	stats: CycleStats;
	now: () => number;
}

async function processSource(
	ctx: CycleContext,
	key: string,
	label: string,
	fetchPosts: (since: number) => Promise<Post[]>,
	handle: (post: Post) => Promise<Outcome>
): Promise<void> {
	const { state, stats } = ctx;
	const since = state.cursors.get(key);

	let posts: Post[];
	try {
		posts = await fetchPosts(since);
	} catch (error) {
		stats.fetchErrors++;
		log.error(`[${label}] fetch failed (${errorKind(error)}): ${errorMessage(error)}`);
		return;
	}
	stats.fetched += posts.length;

	const accepted: Post[] = [];
	for (const post of posts) {
		if (state.store.has(post.id)) {
			stats.skipped++;
			log.debug(`[${label}] ${post.id} already processed, skipping`);
			continue;
		}
		// recorded before any model call so overlapping fetches cannot pick it up twice
		state.store.record(post.id, ctx.now());
		state.inFlight.add(post.id);
		accepted.push(post);
	}

	const retry: Post[] = [];
	for (const batch of chunk(accepted, ctx.settings.concurrency)) {
		const results = await Promise.all(
			batch.map(async (post) => {
				try {
					const outcome = await handle(post);
					state.failures.delete(post.id);
					return { post, outcome, error: undefined };
				} catch (error) {
					return { post, outcome: undefined, error };
				}
			})
		);

		for (const { post, outcome, error } of results) {
			state.inFlight.delete(post.id);
			if (outcome === "notified") stats.notified++;
			else if (outcome === "discarded") stats.discarded++;
			else {
				stats.failed++;
				if (recordFailure(ctx, label, post, error)) retry.push(post);
			}
		}
	}

	const newest = posts.reduce((max, post) => Math.max(max, post.createdUtc), since);
	const oldestRetry = retry.reduce((min, post) => Math.min(min, post.createdUtc), Infinity);
	state.cursors.set(key, Math.min(newest, oldestRetry - 1));
}

/**
 * Logs a per-post failure. Returns true when the post was released for retry,
 * false when it stays marked as seen. Only malformed model output counts
 * toward `maxAttempts`; outages and transport errors always release the post.
 */
function recordFailure(ctx: CycleContext, label: string, post: Post, error: unknown): boolean {
	const { state, settings } = ctx;
	const previous = state.failures.get(post.id);
	const attempts = (previous?.attempts ?? 0) + 1;
	let malformed = previous?.malformed ?? 0;

	let detail = `[${label}] ${post.id} failed (${errorKind(error)}, attempt ${attempts}`;
	if (error instanceof MalformedResponseError) {
		malformed++;
		detail += `, malformed ${malformed}/${settings.maxAttempts}): ${errorMessage(error)}`;
		detail += `; raw response: ${JSON.stringify(truncate(error.raw, RAW_LOG_LIMIT))}`;
	} else {
		detail += `): ${errorMessage(error)}`;
	}

	if (malformed >= settings.maxAttempts) {
		state.failures.delete(post.id);
		log.error(`${detail}; giving up, ${post.url} will not be retried`);
		return false;
	}

	state.failures.set(post.id, { attempts, malformed, firstFailedAt: previous?.firstFailedAt ?? ctx.now() });
	state.store.forget(post.id);
	log.warn(`${detail}; will retry next cycle`);
	return true;
}

async function deliver(ctx: CycleContext, post: Post, classification?: ClassificationResult): Promise<Outcome> {
	const delivered = await ctx.deps.notifier.broadcast(post, classification);
	log.info(`${post.category} post ${post.id} by ${post.author} forwarded to ${delivered} channel(s)`);
	return "notified";
}

function forwardReport(ctx: CycleContext, post: Post): Promise<Outcome> {
	return deliver(ctx, post);
}

async function classifyGeneral(ctx: CycleContext, post: Post): Promise<Outcome> {
	const classification = await ctx.deps.classifier.classify(postContent(post));
	if (!classification) {
		log.debug(`general post ${post.id} by ${post.author} not significant`);
		return "discarded";
	}
	return deliver(ctx, post, classification);
}

async function scoreCommunity(ctx: CycleContext, post: Post, watch: SubredditWatchConfig): Promise<Outcome> {
	const karma = await ctx.deps.source.fetchKarma(post.author);
	if (karma === null || karma < watch.min_karma) {
		log.debug(`r/${post.community} post ${post.id}: author karma ${karma ?? "unknown"} below ${watch.min_karma}`);
		return "discarded";
	}

	const content = postContent(post);
	const sentiment = await ctx.deps.classifier.scoreSentiment(content);
	if (sentiment.score < watch.sentiment_threshold) {
		log.debug(`r/${post.community} post ${post.id}: sentiment ${sentiment.score} below ${watch.sentiment_threshold}`);
		return "discarded";
	}

	const summary = await ctx.deps.classifier.summarize(content);
	return deliver(ctx, post, {
		significance: { isSignificant: true, rationale: `sentiment ${sentiment.score} >= ${watch.sentiment_threshold}` },
		sentiment,
		summary,
	});
}

/** Evicts expired seen entries and stale failure counters, then persists. */
export function runEviction(state: OrchestratorState, now: number, retentionMs: number): number {
	const removed = state.store.evict(now, retentionMs);
	for (const [id, failure] of state.failures) {
		if (now - failure.firstFailedAt > retentionMs) state.failures.delete(id);
	}
	flushState(state);
	log.info(`evicted ${removed} seen entries, ${state.store.size} remain`);
	return removed;
}

export function flushState(state: OrchestratorState): void {
	state.store.flush(state.inFlight);
	state.cursors.flush();
}
