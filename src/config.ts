/**
 * Lazy-loading configuration system for intake checker environment variables.
 */

import { ConfigurationError } from "./exceptions";

export type DispatchMode = "per-target" | "batch";

const DISPATCH_MODES: readonly DispatchMode[] = ["per-target", "batch"];

export function isDispatchMode(value: string): value is DispatchMode {
	return DISPATCH_MODES.some((mode) => mode === value);
}

function readPositiveNumber(name: string, fallback: number): number {
	const raw = process.env[name];
	if (raw === undefined || raw.trim() === "") {
		return fallback;
	}
	const value = Number(raw);
	if (!Number.isFinite(value) || value <= 0) {
		throw new ConfigurationError(`${name} must be a positive number, got "${raw}"`);
	}
	return value;
}

/**
 * Lazy-loading configuration class for environment variables
 * (env vars can change at runtime so we need to get them fresh on every access)
 */
class Config {
	get loggingLevel(): string {
		return (process.env.INTAKE_LOGGING_LEVEL || "info").toLowerCase();
	}

	get logFile(): string {
		return process.env.INTAKE_LOG_FILE || "";
	}

	get browserUseApiKey(): string {
		return (process.env.BROWSER_USE_API_KEY || "").trim();
	}

	get browserUseApiUrl(): string {
		const url = process.env.BROWSER_USE_API_URL || "https://api.browser-use.com";
		if (!url.includes("://")) {
			throw new ConfigurationError("BROWSER_USE_API_URL must be a valid URL");
		}
		return url.replace(/\/$/, "");
	}

	get browserUseLlmModel(): string | null {
		return process.env.BROWSER_USE_LLM_MODEL || null;
	}

	get dispatchMode(): DispatchMode {
		const mode = (process.env.INTAKE_DISPATCH_MODE || "per-target").toLowerCase();
		if (!isDispatchMode(mode)) {
			throw new ConfigurationError(
				`INTAKE_DISPATCH_MODE must be one of ${DISPATCH_MODES.join(", ")}, got "${mode}"`,
			);
		}
		return mode;
	}

	get maxAgentSteps(): number {
		const steps = readPositiveNumber("INTAKE_MAX_AGENT_STEPS", 40);
		if (!Number.isInteger(steps)) {
			throw new ConfigurationError(
				`INTAKE_MAX_AGENT_STEPS must be an integer, got "${steps}"`,
			);
		}
		return steps;
	}

	// Durations are configured in seconds and exposed in milliseconds
	get pollIntervalMs(): number {
		return readPositiveNumber("INTAKE_POLL_INTERVAL", 5) * 1000;
	}

	get taskTimeoutMs(): number {
		return readPositiveNumber("INTAKE_TASK_TIMEOUT", 900) * 1000;
	}

	get requestTimeoutMs(): number {
		return readPositiveNumber("INTAKE_REQUEST_TIMEOUT", 30) * 1000;
	}

	/**
	 * Return the API key or fail before anything touches the network.
	 */
	requireApiKey(): string {
		const apiKey = this.browserUseApiKey;
		if (!apiKey) {
			throw new ConfigurationError(
				"BROWSER_USE_API_KEY is not set. Please add it to your environment variables.",
			);
		}
		return apiKey;
	}
}

// Create a singleton instance
export const CONFIG = new Config();
