import { Classifier } from "./classifier";
import { LlmClient } from "./llm/client";
import { Notifier, formatAlert, type Channel } from "./notify";
import { createState, cursorKey, runCycle, runEviction, type CycleDeps, type CycleSettings, type OrchestratorState } from "./pipeline";
import { CursorBook } from "./store/cursors";
import { SeenPostStore } from "./store/seen";
import { FakeSource, ScriptedProvider, makePost, taggedTemplate } from "./testing/fakes";
import { openStorage, type Storage } from "./db";
import { TimeoutError } from "./errors";
import type { RedditSourceConfig } from "./types";

const slack: Channel = { kind: "slack", enabled: true, webhookUrl: "https://hooks.example.test/services/T000" };

interface Harness {
	source: FakeSource;
	provider: ScriptedProvider;
	fetchImpl: jest.Mock<Promise<Response>, Parameters<typeof fetch>>;
	state: OrchestratorState;
	deps: CycleDeps;
	settings: CycleSettings;
	sentTexts(): string[];
}

function setup(
	reddit: Partial<RedditSourceConfig>,
	options: { startedAt?: number; maxAttempts?: number; storage?: Storage } = {}
): Harness {
	const source = new FakeSource();
	const provider = new ScriptedProvider();
	const fetchImpl = jest.fn<Promise<Response>, Parameters<typeof fetch>>(async () => new Response("ok", { status: 200 }));
	const classifier = new Classifier(new LlmClient(provider, { baseDelayMs: 0 }), {
		sentimentCharLimit: 100,
		summaryCharLimit: 100,
		loadTemplate: taggedTemplate,
	});
	const state = createState(
		new SeenPostStore(options.storage),
		new CursorBook(options.startedAt ?? 0, options.storage)
	);

	return {
		source,
		provider,
		fetchImpl,
		state,
		deps: { source, classifier, notifier: new Notifier([slack], { fetchImpl }), now: () => 5_000_000 },
		settings: {
			reddit: { reports: [], general: [], subreddits: {}, ...reddit },
			concurrency: 3,
			maxAttempts: options.maxAttempts ?? 3,
		},
		sentTexts: () => fetchImpl.mock.calls.map(([, init]) => {
			const body: { text: string } = JSON.parse(String(init?.body));
			return body.text;
		}),
	};
}

describe("runCycle", () => {
	it("forwards report posts without calling the model", async () => {
		const h = setup({ reports: ["alice"] });
		const post = makePost({ id: "r1", title: "", body: "Selling everything.", createdUtc: 1_000 }, "report");
		h.source.accountPosts.set("alice", [post]);

		const stats = await runCycle(h.state, h.deps, h.settings);

		expect(stats).toMatchObject({ fetched: 1, notified: 1, skipped: 0, failed: 0 });
		expect(h.provider.calls).toHaveLength(0);
		expect(h.sentTexts()).toEqual([formatAlert({ ...post, author: "alice" })]);
		expect(h.state.store.has("r1")).toBe(true);
	});

	it("discards general posts judged not significant and keeps them as seen", async () => {
		const h = setup({ general: ["bob"] });
		h.source.accountPosts.set("bob", [makePost({ id: "g1", createdUtc: 1_000 })]);
		h.provider.on("significance", "NO nothing market-moving");

		const stats = await runCycle(h.state, h.deps, h.settings);

		expect(stats).toMatchObject({ discarded: 1, notified: 0 });
		expect(h.provider.callsOf("significance")).toBe(1);
		expect(h.provider.callsOf("sentiment")).toBe(0);
		expect(h.provider.callsOf("summarization")).toBe(0);
		expect(h.fetchImpl).not.toHaveBeenCalled();
		expect(h.state.store.has("g1")).toBe(true);
	});

	it("classifies, scores and summarises significant general posts before forwarding", async () => {
		const h = setup({ general: ["bob"] });
		const post = makePost({ id: "g2", createdUtc: 1_000 });
		h.source.accountPosts.set("bob", [post]);
		h.provider
			.on("significance", "YES acquisition")
			.on("sentiment", '{"sentiment": 77, "direction": "bullish"}')
			.on("summarization", "Bob says ACME is being acquired.");

		await runCycle(h.state, h.deps, h.settings);

		expect(h.sentTexts()).toEqual([
			formatAlert({ ...post, author: "bob" }, {
				significance: { isSignificant: true, rationale: "acquisition" },
				sentiment: { score: 77, direction: "bullish" },
				summary: "Bob says ACME is being acquired.",
			}),
		]);
	});

	it("skips posts already in the store without any model or notifier call", async () => {
		const h = setup({ reports: ["alice"], general: ["bob"] });
		h.source.accountPosts.set("alice", [makePost({ id: "dup1", createdUtc: 1_000 }, "report")]);
		h.source.accountPosts.set("bob", [makePost({ id: "dup2", createdUtc: 1_000 })]);
		h.state.store.record("dup1", 4_000_000);
		h.state.store.record("dup2", 4_000_000);

		const stats = await runCycle(h.state, h.deps, h.settings);

		expect(stats).toMatchObject({ fetched: 2, skipped: 2, notified: 0, discarded: 0 });
		expect(h.provider.calls).toHaveLength(0);
		expect(h.fetchImpl).not.toHaveBeenCalled();
	});

	it("processes an id repeated within one fetch only once", async () => {
		const h = setup({ reports: ["alice"] });
		const post = makePost({ id: "same", createdUtc: 1_000 }, "report");
		h.source.accountPosts.set("alice", [post, post]);

		const stats = await runCycle(h.state, h.deps, h.settings);

		expect(stats).toMatchObject({ notified: 1, skipped: 1 });
		expect(h.fetchImpl).toHaveBeenCalledTimes(1);
	});

	it("sends exactly one notification when the model times out twice before answering YES", async () => {
		const h = setup({ general: ["bob"] });
		h.source.accountPosts.set("bob", [makePost({ id: "t1", createdUtc: 1_000 })]);
		const timeout = new TimeoutError("[test-model]", 30000);
		h.provider
			.on("significance", timeout, timeout, "YES")
			.on("sentiment", '{"sentiment": 55, "direction": "bearish"}')
			.on("summarization", "summary");

		const stats = await runCycle(h.state, h.deps, h.settings);

		expect(stats.notified).toBe(1);
		expect(h.provider.callsOf("significance")).toBe(3);
		expect(h.fetchImpl).toHaveBeenCalledTimes(1);
	});

	it("isolates a failing post and retries it on the next cycle", async () => {
		const h = setup({ general: ["bob"] });
		h.source.accountPosts.set("bob", [
			makePost({ id: "bad", body: "poison", createdUtc: 1_000 }),
			makePost({ id: "good", createdUtc: 1_100 }),
		]);
		let modelDown = true;
		h.provider.on("significance", (prompt) => {
			if (modelDown && prompt.includes("poison")) throw new Error("invalid request");
			return "NO";
		});

		const first = await runCycle(h.state, h.deps, h.settings);

		expect(first).toMatchObject({ failed: 1, discarded: 1 });
		expect(h.state.store.has("bad")).toBe(false);
		expect(h.state.store.has("good")).toBe(true);
		expect(h.state.cursors.get(cursorKey("u", "bob"))).toBe(999);

		modelDown = false;
		const second = await runCycle(h.state, h.deps, h.settings);

		expect(second).toMatchObject({ fetched: 2, skipped: 1, discarded: 1, failed: 0 });
		expect(h.state.store.has("bad")).toBe(true);
		expect(h.state.cursors.get(cursorKey("u", "bob"))).toBe(1_100);
		expect(h.state.failures.size).toBe(0);
	});

	it("never forwards a post whose sentiment output is malformed", async () => {
		const h = setup({ general: ["bob"] });
		h.source.accountPosts.set("bob", [makePost({ id: "m1", createdUtc: 1_000 })]);
		h.provider
			.on("significance", "YES")
			.on("sentiment", '{"sentiment": 150, "direction": "bullish"}')
			.on("summarization", "summary");

		const stats = await runCycle(h.state, h.deps, h.settings);

		expect(stats).toMatchObject({ failed: 1, notified: 0 });
		expect(h.fetchImpl).not.toHaveBeenCalled();
		expect(h.state.store.has("m1")).toBe(false);
	});

	it("gives up on a post whose model output stays malformed", async () => {
		const h = setup({ general: ["bob"] }, { maxAttempts: 2 });
		h.source.accountPosts.set("bob", [makePost({ id: "stuck", createdUtc: 1_000 })]);
		h.provider
			.on("significance", "YES")
			.on("sentiment", "not json");

		await runCycle(h.state, h.deps, h.settings);
		expect(h.state.store.has("stuck")).toBe(false);

		await runCycle(h.state, h.deps, h.settings);
		expect(h.state.store.has("stuck")).toBe(true);
		expect(h.state.failures.has("stuck")).toBe(false);

		const third = await runCycle(h.state, h.deps, h.settings);
		expect(third).toMatchObject({ fetched: 0, failed: 0 });
	});

	it("keeps retrying through a model outage longer than the attempt limit", async () => {
		const h = setup({ general: ["bob"] });
		h.source.accountPosts.set("bob", [makePost({ id: "big", createdUtc: 1_000 })]);
		let down = true;
		h.provider
			.on("significance", () => {
				if (down) throw new TimeoutError("[test-model]", 30000);
				return "YES";
			})
			.on("sentiment", '{"sentiment": 90, "direction": "bullish"}')
			.on("summarization", "Big news.");

		for (let cycle = 0; cycle < 4; cycle++) {
			const stats = await runCycle(h.state, h.deps, h.settings);
			expect(stats).toMatchObject({ fetched: 1, failed: 1, notified: 0 });
		}
		expect(h.state.store.has("big")).toBe(false);
		expect(h.state.failures.get("big")?.attempts).toBe(4);

		down = false;
		const recovered = await runCycle(h.state, h.deps, h.settings);

		expect(recovered).toMatchObject({ fetched: 1, notified: 1, failed: 0 });
		expect(h.fetchImpl).toHaveBeenCalledTimes(1);
		expect(h.state.failures.has("big")).toBe(false);
	});

	it("does not count outage failures toward the malformed-output limit", async () => {
		const h = setup({ general: ["bob"] }, { maxAttempts: 2 });
		h.source.accountPosts.set("bob", [makePost({ id: "mixed", createdUtc: 1_000 })]);
		h.provider
			.on("significance", new TimeoutError("[test-model]", 30000), new TimeoutError("[test-model]", 30000),
				new TimeoutError("[test-model]", 30000), "YES")
			.on("sentiment", "not json");

		await runCycle(h.state, h.deps, h.settings);
		await runCycle(h.state, h.deps, h.settings);

		expect(h.state.store.has("mixed")).toBe(false);
		expect(h.state.failures.get("mixed")).toMatchObject({ attempts: 2, malformed: 1 });
	});

	it("logs the raw model output when it is malformed", async () => {
		const raw = '{"sentiment": 150, "direction": "bullish"}';
		const h = setup({ general: ["bob"] });
		h.source.accountPosts.set("bob", [makePost({ id: "m1", createdUtc: 1_000 })]);
		h.provider.on("significance", "YES").on("sentiment", raw);
		const stderr = jest.spyOn(console, "error").mockImplementation(() => undefined);
		process.env.LOG_LEVEL = "warn";

		let lines: string[] = [];
		try {
			await runCycle(h.state, h.deps, h.settings);
		} finally {
			process.env.LOG_LEVEL = "silent";
			lines = stderr.mock.calls.map(([first]) => String(first));
			stderr.mockRestore();
		}

		const line = lines.find((l) => l.includes("m1 failed"));
		expect(line?.slice(line.indexOf("[u/bob]"))).toBe(
			`[u/bob] m1 failed (MalformedResponseError, attempt 1, malformed 1/3): sentiment out of range: 150; ` +
			`raw response: ${JSON.stringify(raw)}; will retry next cycle`
		);
	});

	it("does not persist a post while its classification is still running", async () => {
		const storage = openStorage(":memory:");
		const h = setup({ general: ["bob"] }, { storage });
		h.source.accountPosts.set("bob", [
			makePost({ id: "done", body: "quick", createdUtc: 1_000 }),
			makePost({ id: "busy", body: "slow", createdUtc: 1_100 }),
		]);
		let answer: (reply: string) => void = () => undefined;
		h.provider.on("significance", (prompt) =>
			prompt.includes("slow") ? new Promise<string>((resolve) => { answer = resolve; }) : "NO"
		);

		const cycle = runCycle(h.state, h.deps, h.settings);
		await new Promise((resolve) => setImmediate(resolve));
		expect(h.state.inFlight.has("busy")).toBe(true);

		runEviction(h.state, 5_000_000, 172_800_000);
		expect(storage.loadSeen()).toEqual([]);

		answer("NO");
		await cycle;

		expect(storage.loadSeen().map((entry) => entry.id).sort()).toEqual(["busy", "done"]);
		expect(h.state.inFlight.size).toBe(0);
		storage.close();
	});

	it("keeps going when one account cannot be fetched", async () => {
		const h = setup({ reports: ["down", "alice"] });
		h.source.failingAccounts.add("down");
		h.source.accountPosts.set("alice", [makePost({ id: "ok1", createdUtc: 1_000 }, "report")]);

		const stats = await runCycle(h.state, h.deps, h.settings);

		expect(stats).toMatchObject({ fetchErrors: 1, notified: 1 });
		expect(h.state.cursors.get(cursorKey("u", "down"))).toBe(0);
	});

	it("starts new sources at the start time instead of backfilling", async () => {
		const h = setup({ reports: ["alice"] }, { startedAt: 2_000 });
		h.source.accountPosts.set("alice", [
			makePost({ id: "before", createdUtc: 1_500 }, "report"),
			makePost({ id: "after", createdUtc: 2_500 }, "report"),
		]);

		const stats = await runCycle(h.state, h.deps, h.settings);

		expect(h.source.fetchCalls).toEqual([{ name: "alice", since: 2_000 }]);
		expect(stats.notified).toBe(1);
		expect(h.state.store.has("before")).toBe(false);
		expect(h.state.cursors.get(cursorKey("u", "alice"))).toBe(2_500);
	});

	it("still marks a post as seen when delivery fails", async () => {
		const h = setup({ reports: ["alice"] });
		h.fetchImpl.mockImplementation(async () => new Response("down", { status: 500 }));
		h.source.accountPosts.set("alice", [makePost({ id: "lost", createdUtc: 1_000 }, "report")]);

		await runCycle(h.state, h.deps, h.settings);

		expect(h.state.store.has("lost")).toBe(true);
	});

	describe("subreddit watches", () => {
		const watch = { target_flair: "DD", min_karma: 1000, sentiment_threshold: 60 };

		it("forwards posts by established authors that clear the sentiment threshold", async () => {
			const h = setup({ subreddits: { stocks: watch } });
			h.source.communityPosts.set("stocks", [makePost({ id: "s1", author: "carol", createdUtc: 1_000 })]);
			h.source.karma.set("carol", 5000);
			h.provider
				.on("sentiment", '{"sentiment": 60, "direction": "bullish"}')
				.on("summarization", "Deep dive on ACME.");

			const stats = await runCycle(h.state, h.deps, h.settings);

			expect(stats.notified).toBe(1);
			expect(h.provider.callsOf("significance")).toBe(0);
			expect(h.sentTexts()[0]).toContain("Sentiment: 60/100 (bullish)");
		});

		it("discards posts by low-karma authors without calling the model", async () => {
			const h = setup({ subreddits: { stocks: watch } });
			h.source.communityPosts.set("stocks", [makePost({ id: "s2", author: "newbie", createdUtc: 1_000 })]);
			h.source.karma.set("newbie", 10);

			const stats = await runCycle(h.state, h.deps, h.settings);

			expect(stats.discarded).toBe(1);
			expect(h.provider.calls).toHaveLength(0);
		});

		it("discards posts below the sentiment threshold", async () => {
			const h = setup({ subreddits: { stocks: watch } });
			h.source.communityPosts.set("stocks", [makePost({ id: "s3", author: "carol", createdUtc: 1_000 })]);
			h.source.karma.set("carol", 5000);
			h.provider.on("sentiment", '{"sentiment": 59, "direction": "bearish"}');

			const stats = await runCycle(h.state, h.deps, h.settings);

			expect(stats.discarded).toBe(1);
			expect(h.provider.callsOf("summarization")).toBe(0);
			expect(h.state.store.has("s3")).toBe(true);
		});
	});
});

describe("runEviction", () => {
	it("drops expired entries and stale failure counters", () => {
		const state = createState(new SeenPostStore(), new CursorBook(0));
		state.store.record("old", 0);
		state.store.record("new", 9_000);
		state.failures.set("gone", { attempts: 1, malformed: 0, firstFailedAt: 0 });
		state.failures.set("recent", { attempts: 1, malformed: 0, firstFailedAt: 9_000 });

		const removed = runEviction(state, 10_000, 5_000);

		expect(removed).toBe(1);
		expect(state.store.has("old")).toBe(false);
		expect(state.store.has("new")).toBe(true);
		expect([...state.failures.keys()]).toEqual(["recent"]);
	});
});
