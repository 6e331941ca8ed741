import "dotenv/config";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import process from "node:process";
import { Command } from "commander";
import { z } from "zod";

import { configError, errorMessage } from "./errors";
import { DEFAULT_BASE_DELAY_SEC, DEFAULT_PHASE_SEC } from "./schedule";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

export const SENSOR_TYPES = ["dht22", "am2302", "dht11"] as const;
export type SensorType = (typeof SENSOR_TYPES)[number];

/**
 * One sensor as described by its key/value file.
 * fileId is the file's base name without extension and keys the sensor map.
 */
export interface SensorConfig {
	fileId: string;
	sensorName: string;
	spreadsheetId: string;
	gpioPin: number;
	type: SensorType;
}

export interface AppConfig {
	/** Directory holding one key/value file per sensor */
	sensorConfigDir: string;
	/** Allow-list of substrings matched against sensor file names */
	sensors: string[];
	sensorType: SensorType;

	paths: {
		output: string;
		logDir: string;
		credentials: string;
	};

	logLevel: LogLevel;

	poll: {
		baseDelaySec: number;
		phaseSec: number;
	};
}

/* ---------- defaults ---------- */

// Package root: src/lib (sources) and dist/lib (build) both sit two levels below it.
const INSTALL_DIR = path.resolve(__dirname, "..", "..");

const DEFAULT_SENSOR_CONFIG_DIR = path.join(INSTALL_DIR, "url");
const DEFAULT_SENSORS = ["home_livingroom", "home_outside"];
const DEFAULT_SENSOR_TYPE: SensorType = "dht22";
const DEFAULT_OUTPUT = path.join(INSTALL_DIR, "output", "sensor_output.csv");
const DEFAULT_LOG_DIR = path.join(INSTALL_DIR, "logs");
const DEFAULT_LOG_LEVEL: LogLevel = "info";

function defaultCredentialsPath(): string {
	const fromEnv = (process.env.GOOGLE_APPLICATION_CREDENTIALS ?? "").trim();
	if (fromEnv) return fromEnv;
	return path.join(os.homedir(), ".config", "dht-logger", "service_account.json");
}

/* ---------- schema ---------- */

const ConfigFileSchema = z
	.object({
		sensorConfigDir: z.string().min(1).optional(),
		sensors: z.array(z.string().min(1)).min(1).optional(),
		sensorType: z.enum(SENSOR_TYPES).optional(),
		paths: z
			.object({
				output: z.string().min(1).optional(),
				logDir: z.string().min(1).optional(),
				credentials: z.string().min(1).optional()
			})
			.strict()
			.optional(),
		logLevel: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).optional(),
		poll: z
			.object({
				baseDelaySec: z.number().positive().optional(),
				phaseSec: z.number().positive().optional()
			})
			.strict()
			.optional()
	})
	.strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

function parseCommandLine(argv: readonly string[]): { configPath?: string } {
	const program = new Command();

	program
		.option("-c, --config <path>", "Path to configuration file (JSON)")
		.allowUnknownOption(true)
		.allowExcessArguments(true);

	program.parse([...argv]);

	const opts = program.opts<{ config?: string }>();
	return { configPath: opts.config };
}

function readConfigFile(configPath: string): ConfigFile {
	let raw: string;
	try {
		raw = fs.readFileSync(configPath, "utf8");
	} catch (err) {
		throw configError(`Cannot read config file ${configPath}: ${errorMessage(err)}`);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(raw) as unknown;
	} catch {
		throw configError(`Invalid JSON in config file ${configPath}`);
	}

	const res = ConfigFileSchema.safeParse(parsed);
	if (!res.success) {
		// Keep the error compact so it fits on one log line.
		const issues = res.error.issues
			.slice(0, 5)
			.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
			.join("; ");
		throw configError(`Config validation failed: ${issues}`, res.error.issues);
	}

	return res.data;
}

/* ---------- validation ---------- */

function validateConfig(cfg: AppConfig): void {
	if (cfg.poll.phaseSec >= cfg.poll.baseDelaySec) {
		throw configError("config.poll.phaseSec must be smaller than config.poll.baseDelaySec");
	}
}

/* ---------- public API ---------- */

/**
 * Build the application config from the optional `-c <file>` argument.
 * Without a config file every setting takes its default.
 * Relative paths inside the file resolve against the file's directory.
 */
export function loadConfig(argv: readonly string[] = process.argv): AppConfig {
	const { configPath } = parseCommandLine(argv);

	const parsed: ConfigFile = configPath ? readConfigFile(configPath) : {};
	const baseDir = configPath ? path.dirname(path.resolve(configPath)) : process.cwd();
	const resolvePath = (p: string | undefined, def: string): string => (p ? path.resolve(baseDir, p) : def);

	const cfg: AppConfig = {
		sensorConfigDir: resolvePath(parsed.sensorConfigDir, DEFAULT_SENSOR_CONFIG_DIR),
		sensors: parsed.sensors ?? [...DEFAULT_SENSORS],
		sensorType: parsed.sensorType ?? DEFAULT_SENSOR_TYPE,
		paths: {
			output: resolvePath(parsed.paths?.output, DEFAULT_OUTPUT),
			logDir: resolvePath(parsed.paths?.logDir, DEFAULT_LOG_DIR),
			credentials: resolvePath(parsed.paths?.credentials, defaultCredentialsPath())
		},
		logLevel: parsed.logLevel ?? DEFAULT_LOG_LEVEL,
		poll: {
			baseDelaySec: parsed.poll?.baseDelaySec ?? DEFAULT_BASE_DELAY_SEC,
			phaseSec: parsed.poll?.phaseSec ?? DEFAULT_PHASE_SEC
		}
	};

	validateConfig(cfg);

	return cfg;
}
