import fs from "fs";
import path from "path";
import winston, { type Logger } from "winston";
import { CONFIG } from "./config";

// stdout is reserved for the JSON results, so every level goes to stderr
const consoleTransport = new winston.transports.Console({
	stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
});

function createFileTransports() {
	const logFile = CONFIG.logFile;
	if (!logFile) {
		return [];
	}
	fs.mkdirSync(path.dirname(path.resolve(logFile)), { recursive: true });
	return [new winston.transports.File({ filename: logFile })];
}

const intakeLogger: Logger = winston.createLogger({
	level: CONFIG.loggingLevel,
	format: winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.printf(({ level, message, timestamp, stack, module }) => {
			const prefix = module ? `[${String(module)}] ` : "";
			if (stack) {
				return `${timestamp} ${level}: ${prefix}${message}\n${stack}`;
			}
			return `${timestamp} ${level}: ${prefix}${message}`;
		}),
	),
	transports: [consoleTransport, ...createFileTransports()],
});

export default intakeLogger;
