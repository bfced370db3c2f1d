import type { Logger } from "winston";
import type { TaskDetails, RunTaskRequest, WaitOptions } from "../cloud/views";
import { CloudTaskClient } from "../cloud/service";
import { CONFIG, type DispatchMode } from "../config";
import { ValidationError } from "../exceptions";
import intakeLogger from "../logging_config";
import { formatElapsed, logPrettyUrl, urlIdentity } from "../utils";
import { parsePractices } from "./practices";
import { buildBatchTask, buildTask } from "./prompts";
import { createStructuredOutputJson } from "./schema";
import {
	type AgentReport,
	AgentReportsSchema,
	type IntakeResult,
	type PracticeTarget,
} from "./views";

const logger: Logger = intakeLogger.child({
	module: "intake/service",
});

/**
 * The part of the hosted agent client the dispatcher needs.
 */
export interface TaskRunner {
	runAndWait(request: RunTaskRequest, options?: WaitOptions): Promise<TaskDetails>;
}

export interface IntakeDispatcherSettings {
	mode?: DispatchMode;
	maxAgentSteps?: number | null;
	llmModel?: string | null;
	/** Clock used for `checked_at` */
	now?: () => Date;
}

export interface FromConfigOverrides {
	mode?: DispatchMode;
	maxAgentSteps?: number;
	httpClient?: typeof fetch;
}

/**
 * Parse the agent's final answer into reports. A missing or blank answer is
 * an empty list; anything that is not JSON matching the result schema fails.
 */
export function parseAgentReports(output: string | null | undefined): AgentReport[] {
	if (output === null || output === undefined || output.trim() === "") {
		return [];
	}

	let data: unknown;
	try {
		data = JSON.parse(output);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ValidationError("Agent answer is not valid JSON", [reason]);
	}

	// a lone object is accepted as a one-element list
	const candidates = Array.isArray(data) ? data : [data];
	const result = AgentReportsSchema.safeParse(candidates);
	if (!result.success) {
		throw ValidationError.fromZodError(
			"Agent answer does not match the result schema",
			result.error,
		);
	}
	return result.data;
}

export class IntakeDispatcher {
	readonly mode: DispatchMode;
	readonly maxAgentSteps: number | null;
	readonly llmModel: string | null;
	private readonly client: TaskRunner;
	private readonly now: () => Date;

	constructor(client: TaskRunner, settings: IntakeDispatcherSettings = {}) {
		this.client = client;
		this.mode = settings.mode ?? "per-target";
		this.maxAgentSteps = settings.maxAgentSteps ?? null;
		this.llmModel = settings.llmModel ?? null;
		this.now = settings.now ?? (() => new Date());
	}

	/**
	 * Build a dispatcher from the environment. Fails with a ConfigurationError
	 * when the API key is missing, before any request is made.
	 */
	static fromConfig(overrides: FromConfigOverrides = {}): IntakeDispatcher {
		const apiKey = CONFIG.requireApiKey();
		const client = new CloudTaskClient({
			apiKey,
			baseUrl: CONFIG.browserUseApiUrl,
			requestTimeoutMs: CONFIG.requestTimeoutMs,
			pollIntervalMs: CONFIG.pollIntervalMs,
			timeoutMs: CONFIG.taskTimeoutMs,
			httpClient: overrides.httpClient,
		});
		return new IntakeDispatcher(client, {
			mode: overrides.mode ?? CONFIG.dispatchMode,
			maxAgentSteps: overrides.maxAgentSteps ?? CONFIG.maxAgentSteps,
			llmModel: CONFIG.browserUseLlmModel,
		});
	}

	/**
	 * Check every target and return one result per target, in input order.
	 */
	async check(targets: readonly PracticeTarget[]): Promise<IntakeResult[]> {
		const practices = parsePractices(targets);
		const startedAt = Date.now();
		logger.info(`🚀 Checking ${practices.length} practice(s) in ${this.mode} mode`);

		const results =
			this.mode === "batch"
				? await this.checkBatch(practices)
				: await this.checkEach(practices);

		logger.debug(`⏳ check() took ${formatElapsed(startedAt)}`);
		return results;
	}

	private async checkEach(practices: PracticeTarget[]): Promise<IntakeResult[]> {
		const structuredOutputJson = createStructuredOutputJson(AgentReportsSchema);
		const results: IntakeResult[] = [];

		for (const target of practices) {
			logger.info(`🔎 ${target.name} (${logPrettyUrl(target.url)})`);
			const details = await this.client.runAndWait({
				task: buildTask(target),
				structuredOutputJson,
				maxAgentSteps: this.maxAgentSteps,
				llmModel: this.llmModel,
			});

			const reports = parseAgentReports(details.output);
			const [report] = reports;
			if (report === undefined) {
				logger.warn(`No answer for ${target.name}, recording it as Unclear`);
				results.push(this.toResult({ status: "Unclear", evidence: "" }, target));
				continue;
			}
			if (reports.length > 1) {
				logger.debug(`Ignoring ${reports.length - 1} extra record(s) for ${target.name}`);
			}

			const result = this.toResult(report, target);
			logger.info(`✅ ${target.name}: ${result.status}`);
			results.push(result);
		}
		return results;
	}

	private async checkBatch(practices: PracticeTarget[]): Promise<IntakeResult[]> {
		const details = await this.client.runAndWait({
			task: buildBatchTask(practices),
			structuredOutputJson: createStructuredOutputJson(AgentReportsSchema),
			maxAgentSteps: this.maxAgentSteps,
			llmModel: this.llmModel,
		});
		const reports = parseAgentReports(details.output);

		// order of the answer is not trusted; match each target by URL, then by name
		const byUrl = new Map<string, AgentReport>();
		const byName = new Map<string, AgentReport>();
		for (const report of reports) {
			if (report.url) {
				const urlKey = urlIdentity(report.url);
				if (!byUrl.has(urlKey)) byUrl.set(urlKey, report);
			}
			if (report.practice) {
				const nameKey = report.practice.trim().toLowerCase();
				if (!byName.has(nameKey)) byName.set(nameKey, report);
			}
		}

		const missing: string[] = [];
		const results: IntakeResult[] = [];
		for (const target of practices) {
			const report =
				byUrl.get(urlIdentity(target.url)) ??
				byName.get(target.name.trim().toLowerCase());
			if (report === undefined) {
				missing.push(`${target.name} (${target.url})`);
				continue;
			}
			const result = this.toResult(report, target);
			logger.info(`✅ ${target.name}: ${result.status}`);
			results.push(result);
		}

		if (missing.length > 0) {
			throw new ValidationError("Agent answer has no record for some practices", missing);
		}
		if (reports.length > practices.length) {
			logger.debug(`Ignoring ${reports.length - practices.length} unmatched record(s)`);
		}
		return results;
	}

	private toResult(
		report: Pick<AgentReport, "status" | "evidence" | "contact_email">,
		target: PracticeTarget,
	): IntakeResult {
		const contactEmail =
			report.status === "Accepting" ? report.contact_email?.trim() || null : null;
		return {
			practice: target.name,
			url: target.url,
			status: report.status,
			evidence: report.evidence ?? null,
			contact_email: contactEmail,
			checked_at: this.now().toISOString(),
		};
	}
}
