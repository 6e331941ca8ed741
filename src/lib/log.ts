import fs from "node:fs";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

export interface LoggerOptions {
	logDir: string;
	serviceName: string;
	level?: string;
}

function getLevel(level?: string): string {
	return (level ?? process.env.LOG_LEVEL ?? "info").toLowerCase();
}

/**
 * Console (journald under systemd) plus daily-rotated files in logDir:
 * <service>.<date>.log for everything at `level`, <service>.error.<date>.log for errors.
 */
export function createLogger(opts: LoggerOptions): winston.Logger {
	const level = getLevel(opts.level);
	fs.mkdirSync(opts.logDir, { recursive: true });

	const lineFormat = winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.printf(info => {
			const ts = String(info.timestamp);
			const meta = typeof info.stack === "string" ? `\n${info.stack}` : "";
			return `${ts} [${opts.serviceName}] ${info.level}: ${String(info.message)}${meta}`;
		})
	);

	const rotated = (fileLevel: string, suffix: string, maxFiles: string): DailyRotateFile =>
		new DailyRotateFile({
			level: fileLevel,
			dirname: opts.logDir,
			filename: `${opts.serviceName}${suffix}.%DATE%.log`,
			datePattern: "YYYY-MM-DD",
			maxFiles,
			zippedArchive: false
		});

	return winston.createLogger({
		level,
		format: lineFormat,
		transports: [
			new winston.transports.Console({ level }),
			rotated(level, "", "14d"),
			rotated("error", ".error", "30d")
		]
	});
}

/**
 * Logger that drops everything; for callers that need a logger but no output.
 */
export function createSilentLogger(): winston.Logger {
	return winston.createLogger({ silent: true });
}
