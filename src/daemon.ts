#!/usr/bin/env node
/**
 * Watch daemon
 * Polls Reddit, classifies posts and sends alerts until stopped.
 *
 * Usage: npm start [-- --run-now] [-- --config=path/to/config.yaml]
 */

import * as path from "path";
import { loadEnv } from "./env";
import { loadConfig, DEFAULT_CONFIG_PATH } from "./config";
import { ConfigError, errorMessage } from "./errors";
import { Classifier } from "./classifier";
import { openStorage, type Storage } from "./db";
import { RedditFetcher } from "./fetchers/reddit";
import { LlmClient, createProvider } from "./llm/client";
import { createLogger } from "./logger";
import { Notifier, type Channel } from "./notify";
import { createState, runCycle, runEviction, type CycleDeps, type CycleSettings, type OrchestratorState } from "./pipeline";
import { Scheduler } from "./scheduler";
import { CursorBook } from "./store/cursors";
import { SeenPostStore } from "./store/seen";
import type { Config } from "./types";

const log = createLogger("daemon");

export function buildChannels(config: Config, env: NodeJS.ProcessEnv = process.env): Channel[] {
	const { telegram, slack } = config.notifications;
	const channels: Channel[] = [];

	if (telegram.enabled) {
		const botToken = env.TELEGRAM_BOT_TOKEN;
		if (!botToken) throw new ConfigError("TELEGRAM_BOT_TOKEN is required when Telegram is enabled");
		channels.push({ kind: "telegram", enabled: true, botToken, chatId: telegram.chat_id });
	}
	if (slack.enabled && slack.webhook_url) {
		channels.push({ kind: "slack", enabled: true, webhookUrl: slack.webhook_url });
	}
	if (channels.length === 0) {
		log.warn("no notification channel enabled, alerts will only be logged");
	}
	return channels;
}

export interface Daemon {
	state: OrchestratorState;
	scheduler: Scheduler;
	pollOnce(): Promise<void>;
	stop(): void;
}

/** Wires every component from a validated config. Throws ConfigError on missing secrets. */
export function createDaemon(config: Config, env: NodeJS.ProcessEnv = process.env, storage?: Storage): Daemon {
	const { system } = config;
	const timeoutMs = system.request_timeout_seconds * 1000;

	const channels = buildChannels(config, env);
	const llm = new LlmClient(createProvider(config.llm, env, timeoutMs), { timeoutMs });
	const classifier = new Classifier(llm, {
		sentimentCharLimit: system.sentiment_char_limit,
		summaryCharLimit: system.summary_char_limit,
	});
	const notifier = new Notifier(channels, { timeoutMs });
	const source = new RedditFetcher({ userAgent: env.REDDIT_USER_AGENT, timeoutMs });

	const db = storage ?? openStorage(path.resolve(process.cwd(), system.cache_file));
	const store = new SeenPostStore(db);
	const cursors = new CursorBook(Math.floor(Date.now() / 1000), db);
	const loaded = store.load();
	cursors.load();
	log.info(`loaded ${loaded} seen posts from ${system.cache_file}`);

	const state = createState(store, cursors);
	const deps: CycleDeps = { source, classifier, notifier };
	const settings: CycleSettings = {
		reddit: config.platforms.reddit,
		concurrency: system.concurrency,
		maxAttempts: system.max_attempts,
	};
	const retentionMs = system.cache_expiration_seconds * 1000;

	const pollOnce = async (): Promise<void> => {
		await runCycle(state, deps, settings);
	};

	const scheduler = new Scheduler()
		.every("poll", system.poll_interval_seconds * 1000, pollOnce)
		.every("eviction", system.cleanup_interval_seconds * 1000, () => runEviction(state, Date.now(), retentionMs));

	if (system.heartbeat.enabled) {
		scheduler.dailyAt("heartbeat", system.heartbeat.times, system.heartbeat.timezone, async () => {
			const text = `Watch daemon alive: ${store.size} posts tracked, model ${llm.model}`;
			await notifier.sendHeartbeat(text);
		});
	}

	return {
		state,
		scheduler,
		pollOnce,
		stop(): void {
			scheduler.stop();
			db.close();
		},
	};
}

async function main(): Promise<void> {
	loadEnv();

	const configArg = process.argv.find((a) => a.startsWith("--config="));
	const configPath = configArg ? path.resolve(configArg.split("=")[1]) : DEFAULT_CONFIG_PATH;
	const config = loadConfig(configPath);
	const daemon = createDaemon(config);

	const { reports, general, subreddits } = config.platforms.reddit;
	log.info("=".repeat(50));
	log.info("Watch daemon started");
	log.info(`report accounts: ${reports.join(", ") || "none"}`);
	log.info(`general accounts: ${general.join(", ") || "none"}`);
	log.info(`subreddits: ${Object.keys(subreddits).join(", ") || "none"}`);
	log.info(`poll every ${config.system.poll_interval_seconds}s, evict every ${config.system.cleanup_interval_seconds}s`);
	log.info("=".repeat(50));

	const shutdown = (signal: string): void => {
		log.info(`${signal} received, daemon stopped`);
		daemon.stop();
		process.exit(0);
	};
	process.on("SIGINT", () => shutdown("SIGINT"));
	process.on("SIGTERM", () => shutdown("SIGTERM"));

	if (process.argv.includes("--run-now")) {
		await daemon.scheduler.runTask("poll", daemon.pollOnce);
	}
	daemon.scheduler.start();
}

if (require.main === module) {
	main().catch((err) => {
		const prefix = err instanceof ConfigError ? "Configuration error" : "Daemon failed";
		log.error(`${prefix}: ${errorMessage(err)}`);
		process.exit(1);
	});
}
