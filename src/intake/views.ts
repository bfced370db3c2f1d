import { z } from "zod";

export const IntakeStatusSchema = z.enum(["Accepting", "Not Accepting", "Unclear"]);
export type IntakeStatus = z.infer<typeof IntakeStatusSchema>;

export const PracticeTargetSchema = z.object({
	name: z.string().trim().min(1, "practice name must not be empty"),
	url: z
		.string()
		.url()
		.refine((value) => /^https?:\/\//i.test(value), {
			message: "practice url must use http or https",
		}),
});
export type PracticeTarget = z.infer<typeof PracticeTargetSchema>;

export const PracticeTargetsSchema = z
	.array(PracticeTargetSchema)
	.min(1, "at least one practice target is required");

/**
 * One practice as reported by the hosted agent. Only `status` is required:
 * practice and url are replaced by the target's own values.
 */
export const AgentReportSchema = z.object({
	practice: z
		.string()
		.nullable()
		.optional()
		.describe("Name of the practice as given in the task"),
	url: z
		.string()
		.nullable()
		.optional()
		.describe("Homepage URL of the practice as given in the task"),
	status: IntakeStatusSchema.describe(
		"Whether the practice is currently taking on new patients",
	),
	evidence: z
		.string()
		.nullable()
		.optional()
		.describe("Exact text copied from the page that supports the status"),
	contact_email: z
		.string()
		.nullable()
		.optional()
		.describe("Contact email address, only when status is Accepting"),
	checked_at: z.string().nullable().optional(),
});
export type AgentReport = z.infer<typeof AgentReportSchema>;

export const AgentReportsSchema = z.array(AgentReportSchema);

export const IntakeResultSchema = z.object({
	practice: z.string().min(1),
	url: z.string().min(1),
	status: IntakeStatusSchema,
	evidence: z.string().nullable(),
	contact_email: z.string().nullable(),
	checked_at: z.string().datetime(),
});
export type IntakeResult = z.infer<typeof IntakeResultSchema>;
