/**
 * Timer-driven tasks. Each task schedules its next run only after the current
 * one settles, so a task never overlaps itself; separate tasks run on separate
 * timers and never wait on each other.
 */

import { createLogger } from "./logger";
import { errorMessage } from "./errors";
import { formatDuration } from "./utils";

const log = createLogger("scheduler");

export type TaskFn = () => Promise<unknown> | unknown;

const DAY_MS = 24 * 60 * 60 * 1000;
// slots closer than this roll over to the next day
const MIN_LEAD_MS = 1000;

/** Milliseconds since midnight for each "HH:MM" entry, sorted. Throws on a bad entry. */
export function parseDailyTimes(times: readonly string[]): number[] {
	if (times.length === 0) throw new Error("no daily times given");
	return times
		.map((time) => {
			const match = /^(\d{1,2}):(\d{2})$/.exec(time);
			const hours = match ? Number(match[1]) : NaN;
			const minutes = match ? Number(match[2]) : NaN;
			if (!(hours <= 23 && minutes <= 59)) throw new Error(`invalid daily time "${time}" (expected HH:MM)`);
			return (hours * 60 + minutes) * 60 * 1000;
		})
		.sort((a, b) => a - b);
}

/** Wall-clock milliseconds since midnight at `now`, in `timezone` or local time. */
function clockMs(now: Date, timezone?: string): number {
	if (!timezone) {
		return ((now.getHours() * 60 + now.getMinutes()) * 60 + now.getSeconds()) * 1000 + now.getMilliseconds();
	}
	const parts = new Intl.DateTimeFormat("en-US", {
		timeZone: timezone,
		hourCycle: "h23",
		hour: "numeric",
		minute: "numeric",
		second: "numeric",
	}).formatToParts(now);
	const part = (type: Intl.DateTimeFormatPartTypes): number =>
		Number(parts.find((p) => p.type === type)?.value ?? 0);
	return ((part("hour") * 60 + part("minute")) * 60 + part("second")) * 1000 + now.getMilliseconds();
}

/** Delay from `now` until the next of `slots` (ms since midnight). */
export function msUntilNextSlot(slots: readonly number[], timezone: string | undefined, now: Date): number {
	const current = clockMs(now, timezone);
	let best = Infinity;
	for (const slot of slots) {
		let delay = slot - current;
		if (delay < MIN_LEAD_MS) delay += DAY_MS;
		best = Math.min(best, delay);
	}
	return best;
}

export class Scheduler {
	private readonly timers = new Map<string, NodeJS.Timeout>();
	private running = false;
	private readonly starters: Array<() => void> = [];

	/** Runs `fn` every `intervalMs`, measured from the end of the previous run. */
	every(name: string, intervalMs: number, fn: TaskFn): this {
		const scheduleNext = (): void => {
			if (!this.running) return;
			this.timers.set(name, setTimeout(() => {
				void this.runTask(name, fn).then(scheduleNext);
			}, intervalMs));
		};
		this.starters.push(scheduleNext);
		return this;
	}

	/** Runs `fn` daily at each of `times` (HH:MM) in `timezone`. Throws on a bad time. */
	dailyAt(name: string, times: readonly string[], timezone: string | undefined, fn: TaskFn): this {
		const slots = parseDailyTimes(times);
		const scheduleNext = (): void => {
			if (!this.running) return;
			const delay = msUntilNextSlot(slots, timezone, new Date());
			log.info(`next ${name}: ${new Date(Date.now() + delay).toISOString()} (in ${formatDuration(delay)})`);
			this.timers.set(name, setTimeout(() => {
				void this.runTask(name, fn).then(scheduleNext);
			}, delay));
		};
		this.starters.push(scheduleNext);
		return this;
	}

	start(): void {
		if (this.running) return;
		this.running = true;
		for (const start of this.starters) start();
	}

	stop(): void {
		this.running = false;
		for (const timer of this.timers.values()) clearTimeout(timer);
		this.timers.clear();
	}

	get isRunning(): boolean {
		return this.running;
	}

	/** Runs `fn` once, logging instead of throwing. */
	async runTask(name: string, fn: TaskFn): Promise<void> {
		try {
			await fn();
		} catch (error) {
			log.error(`task ${name} failed: ${errorMessage(error)}`);
		}
	}
}
