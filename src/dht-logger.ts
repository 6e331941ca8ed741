#!/usr/bin/env node
import type winston from "winston";

import { loadConfig } from "./lib/config";
import type { AppConfig, SensorConfig } from "./lib/config";
import { createLogger } from "./lib/log";
import { describeError } from "./lib/errors";
import { createOutputFile } from "./lib/output-file";
import { runPollLoop } from "./lib/poll-loop";
import { loadSensorConfigs } from "./lib/sensor-files";
import { createSheetUploader } from "./lib/sheets";
import { getSensorModule } from "./sensors";
import { createNodeDhtDriver } from "./sensors/driver";

const SERVICE_NAME = "dht-logger";

function loadSensors(config: AppConfig, logger: winston.Logger): ReadonlyMap<string, SensorConfig> {
	const sensors = loadSensorConfigs(config.sensorConfigDir, config.sensors, logger, config.sensorType);

	// Validate EARLY so a bad sensor file stops the daemon before the first cycle
	for (const sensor of sensors.values()) {
		getSensorModule(sensor.type).validate(sensor);
		logger.info(
			"Sensor: id=%s name=%s type=%s pin=%d spreadsheet=%s",
			sensor.fileId,
			sensor.sensorName,
			sensor.type,
			sensor.gpioPin,
			sensor.spreadsheetId
		);
	}

	return sensors;
}

async function main(): Promise<void> {
	const startedAtMs = Date.now();
	const config = loadConfig();

	const logger = createLogger({
		logDir: config.paths.logDir,
		serviceName: SERVICE_NAME,
		level: config.logLevel
	});

	logger.info("DHT logger starting (sensorConfigDir=%s allowList=%s)", config.sensorConfigDir, config.sensors.join(","));

	const sensors = loadSensors(config, logger);

	const output = createOutputFile(config.paths.output);
	const opened = output.open();
	if (opened.ok) {
		logger.info("Writing readings to %s", output.path);
	} else {
		logger.error("Output file unavailable; will retry on each write (%s)", describeError(opened.error));
	}

	const controller = new AbortController();

	const stopGraceful = (signal: string) => {
		logger.info("Stopping DHT logger (signal=%s)", signal);
		controller.abort();
	};

	const stopImmediate = (signal: string) => {
		logger.info("Immediate stop requested (signal=%s)", signal);
		output.close();
		process.exit(0);
	};

	process.on("SIGINT", () => stopImmediate("SIGINT")); // Ctrl+C
	process.on("SIGTERM", () => stopGraceful("SIGTERM")); // systemd stop

	try {
		await runPollLoop(
			{
				sensors,
				driver: createNodeDhtDriver(),
				output,
				uploader: createSheetUploader({ credentialsPath: config.paths.credentials, logger }),
				logger,
				schedule: config.poll,
				startedAtMs
			},
			controller.signal
		);
	} finally {
		output.close();
		logger.info("DHT logger exiting");
	}
}

main()
	.then(() => process.exit(0))
	.catch(err => {
		console.error(err);
		process.exit(1);
	});
