import * as fs from "fs";
import * as path from "path";
import * as yaml from "yaml";
import { ConfigError, errorMessage } from "./errors";
import type {
	Config,
	LlmProviderName,
	RedditSourceConfig,
	ScheduleConfig,
	SubredditWatchConfig,
	SystemConfig,
	NotificationsConfig,
	LlmConfig,
} from "./types";

export const DEFAULT_CONFIG_PATH = path.join(process.cwd(), "config", "config.yaml");

const ACCOUNT_NAME = /^[A-Za-z0-9_-]{1,32}$/;
const COMMUNITY_NAME = /^[A-Za-z0-9_]{1,32}$/;
const TIME_OF_DAY = /^(\d{1,2}):(\d{2})$/;

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(parent: Section, key: string, where: string): Section {
	const value = parent[key];
	if (value === undefined || value === null) return {};
	if (!isSection(value)) throw new ConfigError(`${where}.${key} must be a mapping`);
	return value;
}

function positiveInt(parent: Section, key: string, fallback: number, where: string): number {
	const value = parent[key] ?? fallback;
	if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
		throw new ConfigError(`${where}.${key} must be a positive integer, got ${JSON.stringify(value)}`);
	}
	return value;
}

function boolean(parent: Section, key: string, fallback: boolean, where: string): boolean {
	const value = parent[key] ?? fallback;
	if (typeof value !== "boolean") {
		throw new ConfigError(`${where}.${key} must be true or false`);
	}
	return value;
}

function optionalString(parent: Section, key: string, where: string): string | undefined {
	const value = parent[key];
	if (value === undefined || value === null) return undefined;
	if (typeof value === "number") return String(value);
	if (typeof value !== "string") throw new ConfigError(`${where}.${key} must be a string`);
	return value.trim() || undefined;
}

function nameList(parent: Section, key: string, where: string): string[] {
	const value = parent[key];
	if (value === undefined || value === null) return [];
	if (!Array.isArray(value)) throw new ConfigError(`${where}.${key} must be a list of account names`);

	return value.map((item: unknown, i) => {
		if (typeof item !== "string" || !ACCOUNT_NAME.test(item.trim())) {
			throw new ConfigError(`${where}.${key}[${i}] is not a valid account name: ${JSON.stringify(item)}`);
		}
		return item.trim();
	});
}

function parseSubreddits(parent: Section): Record<string, SubredditWatchConfig> {
	const raw = section(parent, "subreddits", "platforms.reddit");
	const result: Record<string, SubredditWatchConfig> = {};

	for (const [name, value] of Object.entries(raw)) {
		const where = `platforms.reddit.subreddits.${name}`;
		if (!COMMUNITY_NAME.test(name)) throw new ConfigError(`${where}: invalid subreddit name`);
		const entry = isSection(value) ? value : {};
		const threshold = entry.sentiment_threshold ?? 50;
		if (typeof threshold !== "number" || !Number.isInteger(threshold) || threshold < 0 || threshold > 100) {
			throw new ConfigError(`${where}.sentiment_threshold must be an integer between 0 and 100`);
		}
		const minKarma = entry.min_karma ?? 1000;
		if (typeof minKarma !== "number" || !Number.isInteger(minKarma) || minKarma < 0) {
			throw new ConfigError(`${where}.min_karma must be a non-negative integer`);
		}
		result[name] = {
			target_flair: optionalString(entry, "target_flair", where) ?? "DD",
			min_karma: minKarma,
			sentiment_threshold: threshold,
		};
	}
	return result;
}

function parseReddit(root: Section): RedditSourceConfig {
	const platforms = section(root, "platforms", "config");
	const reddit = section(platforms, "reddit", "platforms");

	const reports = nameList(reddit, "reports", "platforms.reddit");
	const general = nameList(reddit, "general", "platforms.reddit");
	const subreddits = parseSubreddits(reddit);

	const reportSet = new Set(reports.map((name) => name.toLowerCase()));
	const overlap = general.find((name) => reportSet.has(name.toLowerCase()));
	if (overlap) {
		throw new ConfigError(`account "${overlap}" is listed as both a report and a general account`);
	}

	if (reports.length + general.length + Object.keys(subreddits).length === 0) {
		throw new ConfigError("platforms.reddit must list at least one report account, general account or subreddit");
	}

	return { reports, general, subreddits };
}

function parseSchedule(parent: Section, where: string): ScheduleConfig {
	const raw = section(parent, "heartbeat", where);
	const enabled = boolean(raw, "enabled", false, `${where}.heartbeat`);
	const timesRaw = raw.times ?? ["12:00"];
	if (!Array.isArray(timesRaw)) throw new ConfigError(`${where}.heartbeat.times must be a list`);

	const times = timesRaw.map((t: unknown): string => {
		const match = typeof t === "string" ? t.match(TIME_OF_DAY) : null;
		if (typeof t !== "string" || !match || parseInt(match[1], 10) > 23 || parseInt(match[2], 10) > 59) {
			throw new ConfigError(`${where}.heartbeat.times: invalid time ${JSON.stringify(t)} (expected HH:MM)`);
		}
		return t;
	});
	if (enabled && times.length === 0) {
		throw new ConfigError(`${where}.heartbeat.times is empty`);
	}

	return { enabled, times, timezone: optionalString(raw, "timezone", `${where}.heartbeat`) };
}

function parseSystem(root: Section): SystemConfig {
	const raw = section(root, "system", "config");
	const where = "system";
	return {
		sentiment_char_limit: positiveInt(raw, "sentiment_char_limit", 100, where),
		summary_char_limit: positiveInt(raw, "summary_char_limit", 100, where),
		poll_interval_seconds: positiveInt(raw, "poll_interval_seconds", 60, where),
		cleanup_interval_seconds: positiveInt(raw, "cleanup_interval_seconds", 3600, where),
		cache_expiration_seconds: positiveInt(raw, "cache_expiration_seconds", 172800, where),
		cache_file: optionalString(raw, "cache_file", where) ?? path.join("data", "seen.db"),
		concurrency: positiveInt(raw, "concurrency", 5, where),
		max_attempts: positiveInt(raw, "max_attempts", 3, where),
		request_timeout_seconds: positiveInt(raw, "request_timeout_seconds", 30, where),
		heartbeat: parseSchedule(raw, where),
	};
}

function parseNotifications(root: Section, env: NodeJS.ProcessEnv): NotificationsConfig {
	const raw = section(root, "notifications", "config");
	const telegramRaw = section(raw, "telegram", "notifications");
	const slackRaw = section(raw, "slack", "notifications");

	const telegram = {
		enabled: boolean(telegramRaw, "enabled", true, "notifications.telegram"),
		chat_id: optionalString(telegramRaw, "chat_id", "notifications.telegram") ?? "",
	};
	if (telegram.enabled && !telegram.chat_id) {
		throw new ConfigError("notifications.telegram.chat_id is required when Telegram is enabled");
	}

	const slack = {
		enabled: boolean(slackRaw, "enabled", false, "notifications.slack"),
		webhook_url: optionalString(slackRaw, "webhook_url", "notifications.slack") ?? env.SLACK_WEBHOOK_URL,
	};
	if (slack.enabled && !slack.webhook_url) {
		throw new ConfigError("Slack is enabled but neither notifications.slack.webhook_url nor SLACK_WEBHOOK_URL is set");
	}

	return { telegram, slack };
}

function parseLlm(root: Section): LlmConfig {
	const raw = section(root, "llm", "config");
	const provider = optionalString(raw, "provider", "llm") ?? "openai";
	if (!isProvider(provider)) {
		throw new ConfigError(`llm.provider must be "openai" or "anthropic", got "${provider}"`);
	}
	return { provider, model: optionalString(raw, "model", "llm") };
}

function isProvider(value: string): value is LlmProviderName {
	return value === "openai" || value === "anthropic";
}

/**
 * Validates a parsed config document, filling defaults.
 * Throws ConfigError on the first problem found.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): Config {
	if (!isSection(raw)) {
		throw new ConfigError("config must be a YAML mapping");
	}
	return {
		platforms: { reddit: parseReddit(raw) },
		system: parseSystem(raw),
		notifications: parseNotifications(raw, env),
		llm: parseLlm(raw),
	};
}

export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): Config {
	let content: string;
	try {
		content = fs.readFileSync(configPath, "utf-8");
	} catch (error) {
		throw new ConfigError(`cannot read ${configPath}: ${errorMessage(error)}`);
	}

	let parsed: unknown;
	try {
		parsed = yaml.parse(content);
	} catch (error) {
		throw new ConfigError(`invalid YAML in ${configPath}: ${errorMessage(error)}`);
	}

	return parseConfig(parsed, env);
}
