/**
 * Client for the hosted browser agent's task API (Browser Use Cloud).
 */

import { setTimeout as sleep } from "timers/promises";
import type { Logger } from "winston";
import type { z } from "zod";
import { ConfigurationError, ServiceError, formatZodIssues } from "../exceptions";
import intakeLogger from "../logging_config";
import {
	type RunTaskRequest,
	type TaskCreated,
	TaskCreatedSchema,
	type TaskDetails,
	TaskDetailsSchema,
	type TaskStatus,
	type WaitOptions,
} from "./views";

const logger: Logger = intakeLogger.child({
	module: "cloud/service",
});

export interface CloudTaskClientOptions {
	apiKey: string;
	baseUrl?: string;
	/** Per-request timeout */
	requestTimeoutMs?: number;
	pollIntervalMs?: number;
	timeoutMs?: number;
	httpClient?: typeof fetch;
}

export class CloudTaskClient {
	private readonly apiKey: string;
	readonly baseUrl: string;
	readonly requestTimeoutMs: number;
	readonly pollIntervalMs: number;
	readonly timeoutMs: number;
	private readonly httpClient: typeof fetch;

	constructor(options: CloudTaskClientOptions) {
		if (!options.apiKey) {
			throw new ConfigurationError("An API key is required to call the agent service");
		}
		this.apiKey = options.apiKey;
		this.baseUrl = (options.baseUrl ?? "https://api.browser-use.com").replace(/\/$/, "");
		this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
		this.pollIntervalMs = options.pollIntervalMs ?? 5_000;
		this.timeoutMs = options.timeoutMs ?? 900_000;
		this.httpClient = options.httpClient ?? fetch;
	}

	/**
	 * Start a hosted agent task and return its id.
	 */
	async runTask(request: RunTaskRequest): Promise<TaskCreated> {
		const body: Record<string, unknown> = { task: request.task };
		if (request.structuredOutputJson) {
			body.structured_output_json = request.structuredOutputJson;
		}
		if (request.maxAgentSteps) {
			body.max_agent_steps = request.maxAgentSteps;
		}
		if (request.llmModel) {
			body.llm_model = request.llmModel;
		}

		const text = await this.send("POST", "/api/v1/run-task", body);
		const created = this.parse(text, TaskCreatedSchema, "run-task response");
		logger.debug(`Created task ${created.id}`);
		return created;
	}

	async getTask(taskId: string): Promise<TaskDetails> {
		const text = await this.send(
			"GET",
			`/api/v1/task/${encodeURIComponent(taskId)}`,
			undefined,
			taskId,
		);
		return this.parse(text, TaskDetailsSchema, "task details", taskId);
	}

	async stopTask(taskId: string): Promise<void> {
		await this.send(
			"PUT",
			`/api/v1/stop-task?task_id=${encodeURIComponent(taskId)}`,
			undefined,
			taskId,
		);
	}

	/**
	 * Poll a task until it finishes. Failed and stopped tasks, and tasks that
	 * outlive the timeout, raise a ServiceError.
	 */
	async waitForTask(taskId: string, options: WaitOptions = {}): Promise<TaskDetails> {
		const pollIntervalMs = options.pollIntervalMs ?? this.pollIntervalMs;
		const timeoutMs = options.timeoutMs ?? this.timeoutMs;
		const startedAt = Date.now();
		let lastStatus: TaskStatus | null = null;
		let liveUrlShown = false;

		for (;;) {
			const details = await this.getTask(taskId);

			if (details.status !== lastStatus) {
				logger.debug(`Task ${taskId} is ${details.status}`);
				lastStatus = details.status;
			}
			if (details.live_url && !liveUrlShown) {
				logger.info(`🌐 Watch task ${taskId} live: ${details.live_url}`);
				liveUrlShown = true;
			}

			if (details.status === "finished") {
				return details;
			}
			if (details.status === "failed" || details.status === "stopped") {
				throw new ServiceError(
					`Task ${taskId} ended with status "${details.status}"`,
					502,
					taskId,
				);
			}

			if (Date.now() - startedAt >= timeoutMs) {
				await this.stopAfterTimeout(taskId);
				throw new ServiceError(
					`Task ${taskId} did not finish within ${timeoutMs / 1000}s`,
					504,
					taskId,
				);
			}

			await sleep(pollIntervalMs);
		}
	}

	async runAndWait(request: RunTaskRequest, options: WaitOptions = {}): Promise<TaskDetails> {
		const { id } = await this.runTask(request);
		return await this.waitForTask(id, options);
	}

	private async stopAfterTimeout(taskId: string): Promise<void> {
		try {
			await this.stopTask(taskId);
			logger.warn(`⏹️ Stopped task ${taskId} after timeout`);
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error);
			logger.warn(`Could not stop task ${taskId} after timeout: ${reason}`);
		}
	}

	private async send(
		method: "GET" | "POST" | "PUT",
		path: string,
		body?: Record<string, unknown>,
		taskId?: string,
	): Promise<string> {
		const headers: Record<string, string> = {
			Authorization: `Bearer ${this.apiKey}`,
			Accept: "application/json",
		};
		if (body !== undefined) {
			headers["Content-Type"] = "application/json";
		}

		let response: Response;
		let text: string;
		try {
			response = await this.httpClient(`${this.baseUrl}${path}`, {
				method,
				headers,
				body: body === undefined ? undefined : JSON.stringify(body),
				signal: AbortSignal.timeout(this.requestTimeoutMs),
			});
			// the body can still fail mid-stream or hit the request timeout
			text = await response.text();
		} catch (error) {
			const reason = error instanceof Error ? error : new Error(String(error));
			if (reason.name === "TimeoutError" || reason.name === "AbortError") {
				throw new ServiceError(
					`${method} ${path} timed out after ${this.requestTimeoutMs / 1000}s`,
					504,
					taskId,
				);
			}
			throw new ServiceError(
				`Failed to connect to agent service at ${this.baseUrl}: ${reason.message}`,
				503,
				taskId,
			);
		}

		if (response.status === 401 || response.status === 403) {
			throw new ServiceError(
				`Agent service rejected the API key (HTTP ${response.status})`,
				response.status,
				taskId,
			);
		}
		if (!response.ok) {
			throw new ServiceError(
				`${method} ${path} failed: HTTP ${response.status} ${text}`.trim(),
				response.status,
				taskId,
			);
		}
		return text;
	}

	private parse<T>(
		text: string,
		schema: z.ZodType<T, z.ZodTypeDef, unknown>,
		what: string,
		taskId?: string,
	): T {
		let data: unknown;
		try {
			data = JSON.parse(text);
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error);
			throw new ServiceError(`Agent service sent invalid JSON in ${what}: ${reason}`, 502, taskId);
		}

		const result = schema.safeParse(data);
		if (!result.success) {
			const issues = result.error.errors
				.map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`)
				.join(", ");
			throw new ServiceError(`Unexpected ${what} from agent service: ${issues}`, 502, taskId);
		}
		return result.data;
	}
}
