import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import type { PracticeTarget } from "./views";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const STATUS_UNION = '"Accepting" | "Not Accepting" | "Unclear"';

let promptTemplate: string | null = null;

/**
 * Load the task template from the markdown file beside this module.
 */
function loadPromptTemplate(): string {
	if (promptTemplate === null) {
		promptTemplate = readFileSync(join(__dirname, "task_prompt.md"), "utf-8").trimEnd();
	}
	return promptTemplate;
}

function renderTemplate(values: Record<string, string>): string {
	return loadPromptTemplate().replace(/\{(\w+)\}/g, (placeholder, key: string) =>
		key in values ? values[key] ?? placeholder : placeholder,
	);
}

function schemaTemplate(practice: string, url: string): string {
	return [
		"{",
		`  "practice": ${practice},`,
		`  "url": ${url},`,
		`  "status": ${STATUS_UNION},`,
		'  "evidence": "...",',
		'  "contact_email": null,',
		'  "checked_at": null',
		"}",
	].join("\n");
}

/**
 * Instruction for a hosted task that checks one practice and answers with a
 * single-element array.
 */
export function buildTask(target: PracticeTarget): string {
	return renderTemplate({
		subject: "the GP practice is",
		practices: `Practice: ${target.name}\nURL: ${target.url}`,
		shape_rule:
			"The JSON MUST be a single-element array with exactly one object for this practice.",
		schema_subject: "the single object",
		schema: schemaTemplate(JSON.stringify(target.name), JSON.stringify(target.url)),
	});
}

/**
 * Instruction for a hosted task that checks every practice in one run.
 */
export function buildBatchTask(targets: readonly PracticeTarget[]): string {
	const listing = targets
		.map((target, index) => `${index + 1}. Practice: ${target.name}\n   URL: ${target.url}`)
		.join("\n");

	return renderTemplate({
		subject: "each of the GP practices below is",
		practices: `Practices:\n${listing}\n\nCarry out the steps below for every practice, one practice at a time.`,
		shape_rule: `The JSON MUST be an array with exactly ${targets.length} objects, one per practice, in the order listed above.`,
		schema_subject: "each object",
		schema: schemaTemplate(
			'"<practice name exactly as listed>"',
			'"<URL exactly as listed>"',
		),
	});
}
