export type PostCategory = "report" | "general" | "community";

export type SentimentDirection = "bullish" | "bearish";

export interface Post {
	readonly id: string;
	readonly author: string;
	readonly title: string;
	readonly body: string;
	readonly createdUtc: number;   // epoch seconds
	readonly category: PostCategory;
	readonly community?: string;   // subreddit the post was made in
	readonly flair?: string;
	readonly url: string;
}

export interface SignificanceVerdict {
	isSignificant: boolean;
	rationale: string;
}

export interface SentimentScore {
	score: number;                 // integer 0 - 100
	direction: SentimentDirection;
}

export interface ClassificationResult {
	readonly significance: SignificanceVerdict;
	readonly sentiment: SentimentScore;
	readonly summary: string;
}

export interface SeenEntry {
	id: string;
	seenAt: number;                // epoch ms
}

// ── Configuration ─────────────────────────────────────────

export interface SubredditWatchConfig {
	target_flair: string;
	min_karma: number;
	sentiment_threshold: number;
}

export interface RedditSourceConfig {
	reports: string[];
	general: string[];
	subreddits: Record<string, SubredditWatchConfig>;
}

export interface ScheduleConfig {
	enabled: boolean;
	times: string[];
	timezone?: string;
}

export interface SystemConfig {
	sentiment_char_limit: number;
	summary_char_limit: number;
	poll_interval_seconds: number;
	cleanup_interval_seconds: number;
	cache_expiration_seconds: number;
	cache_file: string;
	concurrency: number;
	max_attempts: number;
	request_timeout_seconds: number;
	heartbeat: ScheduleConfig;
}

export interface TelegramChannelConfig {
	enabled: boolean;
	chat_id: string;
}

export interface SlackChannelConfig {
	enabled: boolean;
	webhook_url?: string;
}

export interface NotificationsConfig {
	telegram: TelegramChannelConfig;
	slack: SlackChannelConfig;
}

export type LlmProviderName = "openai" | "anthropic";

export interface LlmConfig {
	provider: LlmProviderName;
	model?: string;
}

export interface Config {
	platforms: {
		reddit: RedditSourceConfig;
	};
	system: SystemConfig;
	notifications: NotificationsConfig;
	llm: LlmConfig;
}
