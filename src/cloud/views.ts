import { z } from "zod";

export const TaskStatusSchema = z.enum([
	"created",
	"running",
	"finished",
	"stopped",
	"paused",
	"failed",
]);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

/**
 * Body of a run-task request
 */
export interface RunTaskRequest {
	task: string;
	structuredOutputJson?: string | null;
	maxAgentSteps?: number | null;
	llmModel?: string | null;
}

export const TaskCreatedSchema = z.object({
	id: z.string().min(1),
});
export type TaskCreated = z.infer<typeof TaskCreatedSchema>;

export const TaskDetailsSchema = z
	.object({
		id: z.string(),
		status: TaskStatusSchema,
		output: z.string().nullable().optional(),
		live_url: z.string().nullable().optional(),
		created_at: z.string().nullable().optional(),
		finished_at: z.string().nullable().optional(),
	})
	.passthrough();
export type TaskDetails = z.infer<typeof TaskDetailsSchema>;

export interface WaitOptions {
	/** Delay between status polls */
	pollIntervalMs?: number;
	/** Give up (and stop the remote task) after this long */
	timeoutMs?: number;
}
