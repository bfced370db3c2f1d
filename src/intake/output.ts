import { mkdir, writeFile } from "fs/promises";
import path from "path";
import type { IntakeResult } from "./views";

/**
 * Pretty-printed JSON array of results. Non-ASCII text is written as is.
 */
export function formatResults(results: readonly IntakeResult[]): string {
	return JSON.stringify(results, null, 2);
}

export async function writeResults(
	results: readonly IntakeResult[],
	filePath: string,
): Promise<string> {
	const resolved = path.resolve(filePath);
	await mkdir(path.dirname(resolved), { recursive: true });
	await writeFile(resolved, `${formatResults(results)}\n`, "utf-8");
	return resolved;
}
