import * as fs from "fs";
import { errorMessage } from "./errors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

let logFileFailed = false;

const LEVELS: Record<LogLevel | "silent", number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

function isLevel(value: string): value is keyof typeof LEVELS {
	return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function threshold(): number {
	const configured = (process.env.LOG_LEVEL || "info").toLowerCase();
	return isLevel(configured) ? LEVELS[configured] : LEVELS.info;
}

function write(level: LogLevel, scope: string, message: string): void {
	if (LEVELS[level] < threshold()) return;

	const line = `[${new Date().toISOString()}] ${level.toUpperCase()} [${scope}] ${message}`;
	if (level === "error" || level === "warn") {
		console.error(line);
	} else {
		console.log(line);
	}

	const logFile = process.env.LOG_FILE;
	if (logFile && !logFileFailed) {
		try {
			fs.appendFileSync(logFile, line + "\n");
		} catch (error) {
			logFileFailed = true;
			console.error(`cannot append to ${logFile}, file logging disabled: ${errorMessage(error)}`);
		}
	}
}

export function createLogger(scope: string): Logger {
	return {
		debug: (message) => write("debug", scope, message),
		info: (message) => write("info", scope, message),
		warn: (message) => write("warn", scope, message),
		error: (message) => write("error", scope, message),
	};
}
