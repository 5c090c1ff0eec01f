import * as fs from "fs";
import * as path from "path";

/**
 * Loads environment variables from a .env file (default: current working directory).
 * Does not override existing environment variables.
 */
export function loadEnv(envPath: string = path.join(process.cwd(), ".env")): void {
	if (!fs.existsSync(envPath)) return;

	const envContent = fs.readFileSync(envPath, "utf-8");
	for (const line of envContent.split("\n")) {
		const trimmed = line.trim();
		if (!trimmed || trimmed.startsWith("#")) continue;

		const eqIndex = trimmed.indexOf("=");
		if (eqIndex === -1) continue;

		const key = trimmed.slice(0, eqIndex).trim();
		const value = unquote(trimmed.slice(eqIndex + 1).trim());
		if (key && !process.env[key]) {
			process.env[key] = value;
		}
	}
}

function unquote(value: string): string {
	if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value[value.length - 1] === value[0]) {
		return value.slice(1, -1);
	}
	return value;
}
