/**
 * Check a hand-picked list of practices in a single hosted task and print a
 * one-line summary per practice.
 *
 * Required Environment Variables:
 * - BROWSER_USE_API_KEY: Your Browser Use Cloud API key
 *
 * Run: npx tsx examples/custom_targets.ts
 */

import "dotenv/config";
import { IntakeDispatcher, type PracticeTarget, ValidationError } from "../src";

const practices: PracticeTarget[] = [
	{ name: "Ark Medical Centre", url: "https://arkmedical.ie/" },
	{ name: "GPdoc Medical Centre", url: "https://www.gpdoc.ie/" },
];

async function main() {
	const dispatcher = IntakeDispatcher.fromConfig({ mode: "batch" });

	try {
		const results = await dispatcher.check(practices);
		for (const result of results) {
			const email = result.contact_email ? ` <${result.contact_email}>` : "";
			console.log(`${result.status.padEnd(13)} ${result.practice}${email}`);
			if (result.evidence) {
				console.log(`              “${result.evidence}”`);
			}
		}
	} catch (error) {
		if (error instanceof ValidationError) {
			console.error("Agent answer did not validate:", error.issues);
		}
		throw error;
	}
}

main().catch((error: unknown) => {
	console.error("💥 Error checking practices:", error);
	process.exitCode = 1;
});
