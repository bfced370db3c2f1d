import { type Mock, beforeEach, describe, expect, test, vi } from "vitest";
import { ConfigurationError, ServiceError } from "../../exceptions";
import { CloudTaskClient } from "../service";

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

describe("CloudTaskClient", () => {
	let httpClient: Mock<typeof fetch>;
	let client: CloudTaskClient;

	beforeEach(() => {
		httpClient = vi.fn<typeof fetch>();
		client = new CloudTaskClient({
			apiKey: "test-key",
			baseUrl: "https://agent.test/",
			pollIntervalMs: 0,
			httpClient,
		});
	});

	test("should require an API key", () => {
		expect(() => new CloudTaskClient({ apiKey: "" })).toThrow(ConfigurationError);
	});

	test("runTask should post the task with snake_case fields", async () => {
		httpClient.mockResolvedValueOnce(jsonResponse({ id: "task-7" }));

		const created = await client.runTask({
			task: "Check the practice",
			structuredOutputJson: '{"type":"array"}',
			maxAgentSteps: 40,
			llmModel: null,
		});

		expect(created).toEqual({ id: "task-7" });
		expect(httpClient).toHaveBeenCalledTimes(1);
		const [url, init] = httpClient.mock.calls[0] ?? [];
		expect(url).toBe("https://agent.test/api/v1/run-task");
		expect(init?.method).toBe("POST");
		const headers = new Headers(init?.headers);
		expect(headers.get("authorization")).toBe("Bearer test-key");
		expect(headers.get("content-type")).toBe("application/json");
		expect(JSON.parse(String(init?.body))).toEqual({
			task: "Check the practice",
			structured_output_json: '{"type":"array"}',
			max_agent_steps: 40,
		});
	});

	test("should report a rejected API key", async () => {
		httpClient.mockResolvedValueOnce(jsonResponse({ detail: "Unauthorized" }, 401));

		await expect(client.runTask({ task: "x" })).rejects.toMatchObject({
			name: "ServiceError",
			statusCode: 401,
			message: "Agent service rejected the API key (HTTP 401)",
		});
	});

	test("should include status and body of other HTTP errors", async () => {
		httpClient.mockResolvedValueOnce(new Response("upstream busy", { status: 503 }));

		await expect(client.getTask("task-7")).rejects.toMatchObject({
			statusCode: 503,
			taskId: "task-7",
			message: "GET /api/v1/task/task-7 failed: HTTP 503 upstream busy",
		});
	});

	test("should wrap connection failures", async () => {
		httpClient.mockRejectedValueOnce(new TypeError("fetch failed"));

		await expect(client.runTask({ task: "x" })).rejects.toMatchObject({
			statusCode: 503,
			message: "Failed to connect to agent service at https://agent.test: fetch failed",
		});
	});

	test("should wrap a response body that fails mid-stream", async () => {
		const body = new ReadableStream<Uint8Array>({
			start(controller) {
				controller.error(new TypeError("terminated"));
			},
		});
		httpClient.mockResolvedValueOnce(new Response(body, { status: 200 }));

		await expect(client.getTask("task-7")).rejects.toMatchObject({
			name: "ServiceError",
			statusCode: 503,
			taskId: "task-7",
			message: "Failed to connect to agent service at https://agent.test: terminated",
		});
	});

	test("should report a body read cut off by the request timeout", async () => {
		const body = new ReadableStream<Uint8Array>({
			start(controller) {
				controller.error(new DOMException("The operation timed out.", "TimeoutError"));
			},
		});
		httpClient.mockResolvedValueOnce(new Response(body, { status: 200 }));

		await expect(client.getTask("task-7")).rejects.toMatchObject({
			statusCode: 504,
			message: "GET /api/v1/task/task-7 timed out after 30s",
		});
	});

	test("should reject a malformed task envelope", async () => {
		httpClient.mockResolvedValueOnce(jsonResponse({ id: "task-7", status: "exploded" }));

		await expect(client.getTask("task-7")).rejects.toBeInstanceOf(ServiceError);
	});

	test("should reject a body that is not JSON", async () => {
		httpClient.mockResolvedValueOnce(new Response("<html>", { status: 200 }));

		await expect(client.runTask({ task: "x" })).rejects.toBeInstanceOf(ServiceError);
	});

	test("waitForTask should poll until the task finishes", async () => {
		httpClient
			.mockResolvedValueOnce(jsonResponse({ id: "task-7", status: "created" }))
			.mockResolvedValueOnce(
				jsonResponse({ id: "task-7", status: "running", live_url: "https://live.test/7" }),
			)
			.mockResolvedValueOnce(
				jsonResponse({ id: "task-7", status: "finished", output: '[{"status":"Unclear"}]' }),
			);

		const details = await client.waitForTask("task-7");

		expect(details.status).toBe("finished");
		expect(details.output).toBe('[{"status":"Unclear"}]');
		expect(httpClient).toHaveBeenCalledTimes(3);
		expect(httpClient.mock.calls.every(([url]) => url === "https://agent.test/api/v1/task/task-7")).toBe(
			true,
		);
	});

	test("waitForTask should fail for a failed task", async () => {
		httpClient.mockResolvedValueOnce(jsonResponse({ id: "task-7", status: "failed" }));

		await expect(client.waitForTask("task-7")).rejects.toMatchObject({
			name: "ServiceError",
			taskId: "task-7",
			message: 'Task task-7 ended with status "failed"',
		});
	});

	test("waitForTask should stop the task and fail after the timeout", async () => {
		httpClient
			.mockResolvedValueOnce(jsonResponse({ id: "task-7", status: "running" }))
			.mockResolvedValueOnce(new Response("", { status: 200 }));

		await expect(client.waitForTask("task-7", { timeoutMs: 0 })).rejects.toMatchObject({
			statusCode: 504,
			message: "Task task-7 did not finish within 0s",
		});
		const [url, init] = httpClient.mock.calls[1] ?? [];
		expect(url).toBe("https://agent.test/api/v1/stop-task?task_id=task-7");
		expect(init?.method).toBe("PUT");
	});

	test("waitForTask should still report the timeout when stopping fails", async () => {
		httpClient
			.mockResolvedValueOnce(jsonResponse({ id: "task-7", status: "paused" }))
			.mockResolvedValueOnce(new Response("gone", { status: 500 }));

		await expect(client.waitForTask("task-7", { timeoutMs: 0 })).rejects.toMatchObject({
			statusCode: 504,
		});
	});

	test("runAndWait should create the task and wait for it", async () => {
		httpClient
			.mockResolvedValueOnce(jsonResponse({ id: "task-9" }))
			.mockResolvedValueOnce(jsonResponse({ id: "task-9", status: "finished", output: "[]" }));

		const details = await client.runAndWait({ task: "x" });

		expect(details).toMatchObject({ id: "task-9", status: "finished", output: "[]" });
		expect(httpClient.mock.calls[1]?.[0]).toBe("https://agent.test/api/v1/task/task-9");
	});
});
