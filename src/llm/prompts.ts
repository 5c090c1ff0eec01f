import * as fs from "fs";
import * as path from "path";

export type PromptName = "significance" | "sentiment" | "summarization";

export const PROMPTS_DIR = path.resolve(__dirname, "..", "..", "prompts");

const cache = new Map<PromptName, string>();

export function loadPromptTemplate(name: PromptName, dir: string = PROMPTS_DIR): string {
	const cached = dir === PROMPTS_DIR ? cache.get(name) : undefined;
	if (cached !== undefined) return cached;

	const template = fs.readFileSync(path.join(dir, `${name}.txt`), "utf-8");
	if (dir === PROMPTS_DIR) cache.set(name, template);
	return template;
}

/**
 * Substitutes `{name}` placeholders. Unknown placeholders are left as-is and
 * substituted values are never rescanned.
 */
export function renderTemplate(template: string, values: Record<string, string | number>): string {
	return template.replace(/\{([a-z_]+)\}/g, (match, key: string) =>
		Object.prototype.hasOwnProperty.call(values, key) ? String(values[key]) : match
	);
}
