import { readFile } from "fs/promises";
import { ConfigurationError, formatZodIssues } from "../exceptions";
import { type PracticeTarget, PracticeTargetsSchema } from "./views";

export const DEFAULT_PRACTICES: readonly PracticeTarget[] = [
	{
		name: "Ark Medical Centre (New patient enquiry)",
		url: "https://arkmedical.ie/",
	},
	{
		name: "Mercer’s Medical Centre",
		url: "https://www.mercersmedicalcentre.com/",
	},
	{
		name: "Sirona Medical (Practice policies)",
		url: "https://www.sironamedical.ie/",
	},
	{
		name: "GPdoc Medical Centre",
		url: "https://www.gpdoc.ie/",
	},
];

/**
 * Validate an in-memory practice list.
 */
export function parsePractices(data: unknown, source = "practice list"): PracticeTarget[] {
	const result = PracticeTargetsSchema.safeParse(data);
	if (!result.success) {
		const issues = formatZodIssues(result.error).join(", ");
		throw new ConfigurationError(`Invalid ${source}: ${issues}`);
	}
	return result.data;
}

/**
 * Load practice targets from a JSON file holding an array of `{ name, url }`.
 */
export async function loadPractices(filePath: string): Promise<PracticeTarget[]> {
	let content: string;
	try {
		content = await readFile(filePath, "utf-8");
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigurationError(`Cannot read practice list ${filePath}: ${reason}`);
	}

	let data: unknown;
	try {
		data = JSON.parse(content);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigurationError(`Practice list ${filePath} is not valid JSON: ${reason}`);
	}
	return parsePractices(data, `practice list ${filePath}`);
}
