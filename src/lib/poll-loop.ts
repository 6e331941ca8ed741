import type winston from "winston";

import { getSensorModule } from "../sensors";
import type { DhtDriver } from "../sensors/types";
import type { SensorConfig } from "./config";
import { describeError } from "./errors";
import { toSheetRow } from "./format";
import type { OutputFile } from "./output-file";
import { nextDelaySec, sleep as abortableSleep } from "./schedule";
import type { SheetUploader } from "./sheets";

export type PollState = "initializing" | "polling" | "sleeping";

export interface PollContext {
	sensors: ReadonlyMap<string, SensorConfig>;
	driver: DhtDriver;
	output: OutputFile;
	uploader: SheetUploader;
	logger: winston.Logger;
	schedule: {
		baseDelaySec: number;
		phaseSec: number;
	};
	/** Process start (epoch ms); the sleep phase is anchored here. Defaults to now() when the loop starts. */
	startedAtMs?: number;
	now?: () => number;
	sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export interface CycleSummary {
	sensors: number;
	readings: number;
	readFailures: number;
	localWrites: number;
	localFailures: number;
	remoteUploads: number;
	remoteFailures: number;
}

function emptySummary(): CycleSummary {
	return {
		sensors: 0,
		readings: 0,
		readFailures: 0,
		localWrites: 0,
		localFailures: 0,
		remoteUploads: 0,
		remoteFailures: 0
	};
}

/**
 * One pass over every sensor, in map order: read, append locally, upload.
 * All sensors share `at`. Failures are logged and counted, never thrown.
 * Stops early between sensors when `signal` aborts.
 */
export async function pollOnce(ctx: PollContext, at: Date, signal?: AbortSignal): Promise<CycleSummary> {
	const summary = emptySummary();

	for (const [fileId, sensor] of ctx.sensors) {
		if (signal?.aborted) break;
		summary.sensors++;

		const read = await getSensorModule(sensor.type).read(ctx.driver, sensor, at);
		if (!read.ok) {
			summary.readFailures++;
			ctx.logger.warn("Sensor %s: no reading (%s)", fileId, describeError(read.error));
			continue;
		}
		summary.readings++;

		const reading = read.value;
		ctx.logger.info(
			"Sensor %s: temp=%s C (%s F) humidity=%s%% pin=%d",
			fileId,
			reading.temperatureCelsius.toFixed(1),
			reading.temperatureFahrenheit.toFixed(1),
			reading.humidityPercent.toFixed(1),
			reading.gpioPin
		);

		const local = ctx.output.append(reading);
		if (local.ok) {
			summary.localWrites++;
		} else {
			summary.localFailures++;
			ctx.logger.error("Sensor %s: local write failed (%s)", fileId, describeError(local.error));
		}

		const remote = await ctx.uploader.appendRow(sensor.spreadsheetId, toSheetRow(reading));
		if (remote.ok) {
			summary.remoteUploads++;
		} else {
			summary.remoteFailures++;
			ctx.logger.error("Sensor %s: upload failed (%s)", fileId, describeError(remote.error));
		}
	}

	return summary;
}

/**
 * Poll every sensor, sleep until the next phase-aligned wake-up, repeat.
 * Runs until `signal` aborts; the signal is honoured between sensors and
 * during the sleep.
 */
export async function runPollLoop(ctx: PollContext, signal: AbortSignal): Promise<void> {
	const now = ctx.now ?? Date.now;
	const sleep = ctx.sleep ?? abortableSleep;

	let state: PollState = "initializing";
	const setState = (next: PollState): void => {
		ctx.logger.debug("Poll loop: %s -> %s", state, next);
		state = next;
	};

	const startMs = ctx.startedAtMs ?? now();
	ctx.logger.info("Poll loop starting (sensors=%d)", ctx.sensors.size);

	while (!signal.aborted) {
		setState("polling");
		const at = new Date(now());
		const summary = await pollOnce(ctx, at, signal);

		ctx.logger.info(
			"Cycle done: readings=%d/%d local=%d remote=%d",
			summary.readings,
			summary.sensors,
			summary.localWrites,
			summary.remoteUploads
		);

		if (signal.aborted) break;

		const delaySec = nextDelaySec(startMs, now(), ctx.schedule.baseDelaySec, ctx.schedule.phaseSec);
		setState("sleeping");
		ctx.logger.debug("Sleeping %s s", delaySec.toFixed(3));
		await sleep(Math.round(delaySec * 1000), signal);
	}

	ctx.logger.info("Poll loop stopped");
}
