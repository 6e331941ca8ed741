import fs from "node:fs";
import path from "node:path";
import type winston from "winston";
import { z } from "zod";

import type { SensorConfig, SensorType } from "./config";
import { SENSOR_TYPES } from "./config";
import { configError, errorMessage } from "./errors";

// Example sensor file (key <whitespace> value, one pair per line):
//
//   id    1AbCdEfGhIjKlMnOpQrStUvWxYz0123456789abcdefg
//   pin   4
//   name  home_livingroom
//   type  dht22          (optional)

const SensorFileSchema = z.object({
	id: z.string().min(1),
	pin: z.coerce.number().int().nonnegative(),
	name: z.string().min(1),
	type: z.enum(SENSOR_TYPES).optional()
});

/**
 * Parse the key/value pairs of one sensor file.
 * Blank lines are skipped; any other line must have exactly two tokens.
 */
export function parseKeyValueFile(content: string, filePath: string): Record<string, string> {
	const out: Record<string, string> = {};
	const lines = content.split(/\r?\n/);

	lines.forEach((line, idx) => {
		if (line.trim() === "") return;

		const tokens = line.trim().split(/\s+/);
		if (tokens.length !== 2) {
			throw configError(`${filePath}:${idx + 1}: expected "key value", got ${tokens.length} token(s)`, { line });
		}

		const [key, value] = tokens;
		out[key] = value;
	});

	return out;
}

export function parseSensorFile(
	content: string,
	filePath: string,
	fileId: string,
	defaultType: SensorType
): SensorConfig {
	const res = SensorFileSchema.safeParse(parseKeyValueFile(content, filePath));
	if (!res.success) {
		const issues = res.error.issues.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`).join("; ");
		throw configError(`${filePath}: invalid sensor file: ${issues}`, res.error.issues);
	}

	return Object.freeze({
		fileId,
		sensorName: res.data.name,
		spreadsheetId: res.data.id,
		gpioPin: res.data.pin,
		type: res.data.type ?? defaultType
	});
}

function matchesAllowList(fileId: string, allowList: readonly string[]): boolean {
	return allowList.some(s => fileId.includes(s));
}

function listCandidateFiles(dir: string): string[] {
	let entries: fs.Dirent[];
	try {
		entries = fs.readdirSync(dir, { withFileTypes: true });
	} catch (err) {
		throw configError(`Sensor config directory ${dir} cannot be read: ${errorMessage(err)}`);
	}

	return entries
		.filter(e => e.isFile() && !e.name.startsWith("."))
		.map(e => e.name)
		.sort();
}

/**
 * Load every sensor file in `dir` whose base name (extension stripped)
 * contains one of the allow-list strings.
 *
 * Returns a map keyed by that base name, in file-name order.
 * Throws a CONFIG_ERROR on a missing directory, a malformed file
 * or a duplicate base name. No match yields an empty map.
 */
export function loadSensorConfigs(
	dir: string,
	allowList: readonly string[],
	logger: winston.Logger,
	defaultType: SensorType = "dht22"
): ReadonlyMap<string, SensorConfig> {
	const sensors = new Map<string, SensorConfig>();

	for (const name of listCandidateFiles(dir)) {
		const filePath = path.join(dir, name);
		const fileId = path.parse(name).name;

		if (!matchesAllowList(fileId, allowList)) {
			logger.debug("Sensor file %s: no match", filePath);
			continue;
		}
		logger.debug("Sensor file %s: matched", filePath);

		if (sensors.has(fileId)) {
			throw configError(`Duplicate sensor file id '${fileId}' in ${dir}`);
		}

		let content: string;
		try {
			content = fs.readFileSync(filePath, "utf8");
		} catch (err) {
			throw configError(`Cannot read sensor file ${filePath}: ${errorMessage(err)}`);
		}

		sensors.set(fileId, parseSensorFile(content, filePath, fileId, defaultType));
	}

	if (sensors.size === 0) {
		logger.warn("No sensor files in %s match any of: %s", dir, allowList.join(", "));
	}

	return sensors;
}
