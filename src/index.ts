import intakeLogger from "./logging_config";
export const logger = intakeLogger;

export { CONFIG, type DispatchMode } from "./config";
export {
	IntakeError,
	ConfigurationError,
	ServiceError,
	ValidationError,
} from "./exceptions";

export { CloudTaskClient, type CloudTaskClientOptions } from "./cloud/service";
export type { RunTaskRequest, TaskDetails, TaskStatus, WaitOptions } from "./cloud/views";

export {
	IntakeDispatcher,
	parseAgentReports,
	type IntakeDispatcherSettings,
	type TaskRunner,
} from "./intake/service";
export { buildTask, buildBatchTask } from "./intake/prompts";
export { createStructuredOutputJson } from "./intake/schema";
export { DEFAULT_PRACTICES, loadPractices, parsePractices } from "./intake/practices";
export { formatResults, writeResults } from "./intake/output";
export {
	AgentReportSchema,
	IntakeResultSchema,
	IntakeStatusSchema,
	PracticeTargetSchema,
	type AgentReport,
	type IntakeResult,
	type IntakeStatus,
	type PracticeTarget,
} from "./intake/views";
