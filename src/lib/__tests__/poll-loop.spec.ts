import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { DhtDriver, DhtSample } from "../../sensors/types";
import type { SensorConfig } from "../config";
import { localWriteError, remoteUploadError } from "../errors";
import type { SheetCell } from "../format";
import { createSilentLogger } from "../log";
import { createOutputFile } from "../output-file";
import type { OutputFile } from "../output-file";
import { pollOnce, runPollLoop } from "../poll-loop";
import type { PollContext } from "../poll-loop";
import { fail, ok } from "../result";
import type { Result } from "../result";
import type { SheetUploader } from "../sheets";

const HEADER = "date\ttime\ttemp_c\ttemp_f\thumidity\tpin\r\n";
const AT = new Date(2026, 0, 15, 9, 5, 7);

function sensor(fileId: string, spreadsheetId: string, gpioPin: number): SensorConfig {
	return { fileId, sensorName: fileId, spreadsheetId, gpioPin, type: "dht22" };
}

function sensorMap(...sensors: SensorConfig[]): ReadonlyMap<string, SensorConfig> {
	return new Map(sensors.map(s => [s.fileId, s]));
}

function fakeDriver(samplesByPin: Record<number, DhtSample>) {
	const read = vi.fn(async (_kind: number, pin: number): Promise<DhtSample> => samplesByPin[pin] ?? {});
	const driver: DhtDriver = { read };
	return { driver, read };
}

function fakeUploader(failingIds: readonly string[] = []) {
	const appendRow = vi.fn(
		async (spreadsheetId: string, _row: readonly SheetCell[]): Promise<Result<void>> =>
			failingIds.includes(spreadsheetId)
				? fail(remoteUploadError("Failed to upload to Google Sheets", { spreadsheetId }))
				: ok(undefined)
	);
	const uploader: SheetUploader = { appendRow };
	return { uploader, appendRow };
}

describe("poll-loop", () => {
	let dir: string;
	let output: OutputFile;
	let outputPath: string;

	const base = (overrides: Partial<PollContext>): PollContext => ({
		sensors: sensorMap(sensor("home_livingroom", "ABC123", 4)),
		driver: fakeDriver({}).driver,
		output,
		uploader: fakeUploader().uploader,
		logger: createSilentLogger(),
		schedule: { baseDelaySec: 120, phaseSec: 60 },
		...overrides
	});

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "dht-poll-"));
		outputPath = path.join(dir, "output", "sensor_output.csv");
		output = createOutputFile(outputPath);
	});

	afterEach(() => {
		output.close();
		fs.rmSync(dir, { recursive: true, force: true });
	});

	describe("pollOnce", () => {
		it("writes the living room reading locally and remotely", async () => {
			const { driver, read } = fakeDriver({ 4: { temperature: 21.4, humidity: 55.2 } });
			const { uploader, appendRow } = fakeUploader();

			const summary = await pollOnce(base({ driver, uploader }), AT);

			expect(read).toHaveBeenCalledWith(22, 4);
			expect(fs.readFileSync(outputPath, "utf8")).toBe(`${HEADER}2026-01-15\t09:05:07\t21.4\t70.5\t55.2\t4\r\n`);
			expect(appendRow).toHaveBeenCalledTimes(1);
			expect(appendRow).toHaveBeenCalledWith("ABC123", ["2026-01-15", 21.4, 70.5, 55.2]);
			expect(summary).toEqual({
				sensors: 1,
				readings: 1,
				readFailures: 0,
				localWrites: 1,
				localFailures: 0,
				remoteUploads: 1,
				remoteFailures: 0
			});
		});

		it("writes nothing for a sensor that returns no data and moves on", async () => {
			const { driver } = fakeDriver({
				4: { temperature: null, humidity: null },
				17: { temperature: 5, humidity: 80 }
			});
			const { uploader, appendRow } = fakeUploader();
			expect(output.open().ok).toBe(true);

			const summary = await pollOnce(
				base({
					sensors: sensorMap(sensor("home_livingroom", "ABC123", 4), sensor("home_outside", "DEF456", 17)),
					driver,
					uploader
				}),
				AT
			);

			expect(fs.readFileSync(outputPath, "utf8")).toBe(`${HEADER}2026-01-15\t09:05:07\t5.0\t41.0\t80.0\t17\r\n`);
			expect(appendRow).toHaveBeenCalledTimes(1);
			expect(appendRow).toHaveBeenCalledWith("DEF456", ["2026-01-15", 5, 41, 80]);
			expect(summary.readFailures).toBe(1);
			expect(summary.readings).toBe(1);
		});

		it("keeps local and other sensors' writes going when one upload fails", async () => {
			const { driver } = fakeDriver({
				4: { temperature: 21.4, humidity: 55.2 },
				17: { temperature: 20, humidity: 60 }
			});
			const { uploader, appendRow } = fakeUploader(["SHEET_A"]);

			const summary = await pollOnce(
				base({
					sensors: sensorMap(sensor("sensor_a", "SHEET_A", 4), sensor("sensor_b", "SHEET_B", 17)),
					driver,
					uploader
				}),
				AT
			);

			expect(fs.readFileSync(outputPath, "utf8")).toBe(
				`${HEADER}2026-01-15\t09:05:07\t21.4\t70.5\t55.2\t4\r\n2026-01-15\t09:05:07\t20.0\t68.0\t60.0\t17\r\n`
			);
			expect(appendRow.mock.calls.map(c => c[0])).toEqual(["SHEET_A", "SHEET_B"]);
			expect(summary).toMatchObject({ localWrites: 2, remoteUploads: 1, remoteFailures: 1 });
		});

		it("still uploads when the local write fails", async () => {
			const { driver } = fakeDriver({ 4: { temperature: 21.4, humidity: 55.2 } });
			const { uploader, appendRow } = fakeUploader();
			const failingOutput: OutputFile = {
				path: "/dev/null/out.csv",
				open: () => ok(undefined),
				append: () => fail(localWriteError("Failed to write: disk full")),
				close: () => undefined
			};

			const summary = await pollOnce(base({ driver, uploader, output: failingOutput }), AT);

			expect(appendRow).toHaveBeenCalledWith("ABC123", ["2026-01-15", 21.4, 70.5, 55.2]);
			expect(summary).toMatchObject({ localWrites: 0, localFailures: 1, remoteUploads: 1 });
		});

		it("stops between sensors once aborted", async () => {
			const { driver, read } = fakeDriver({ 4: { temperature: 21.4, humidity: 55.2 } });
			const controller = new AbortController();
			controller.abort();

			const summary = await pollOnce(base({ driver }), AT, controller.signal);

			expect(read).not.toHaveBeenCalled();
			expect(summary.sensors).toBe(0);
		});
	});

	describe("runPollLoop", () => {
		it("shares one timestamp per cycle and sleeps until the next phase", async () => {
			const { driver } = fakeDriver({
				4: { temperature: 21.4, humidity: 55.2 },
				17: { temperature: 20, humidity: 60 }
			});
			const { uploader } = fakeUploader();
			const T0 = new Date(2026, 0, 15, 9, 5, 7).getTime();
			const times = [T0, T0 + 5_000];
			const now = vi.fn(() => times.shift() ?? T0 + 10_000);

			const controller = new AbortController();
			const sleep = vi.fn(async (_ms: number, _signal: AbortSignal): Promise<void> => {
				controller.abort();
			});

			await runPollLoop(
				base({
					sensors: sensorMap(sensor("sensor_a", "SHEET_A", 4), sensor("sensor_b", "SHEET_B", 17)),
					driver,
					uploader,
					startedAtMs: T0,
					now,
					sleep
				}),
				controller.signal
			);

			expect(sleep).toHaveBeenCalledTimes(1);
			expect(sleep).toHaveBeenCalledWith(115_000, controller.signal);
			expect(fs.readFileSync(outputPath, "utf8")).toBe(
				`${HEADER}2026-01-15\t09:05:07\t21.4\t70.5\t55.2\t4\r\n2026-01-15\t09:05:07\t20.0\t68.0\t60.0\t17\r\n`
			);
		});

		it("runs another cycle after sleeping", async () => {
			const { driver, read } = fakeDriver({ 4: { temperature: 21.4, humidity: 55.2 } });
			const controller = new AbortController();
			let sleeps = 0;
			const sleep = async (): Promise<void> => {
				sleeps++;
				if (sleeps === 2) controller.abort();
			};

			await runPollLoop(base({ driver, startedAtMs: 0, now: () => 1_000, sleep }), controller.signal);

			expect(read).toHaveBeenCalledTimes(2);
			expect(sleeps).toBe(2);
		});

		it("does nothing when already stopped", async () => {
			const { driver, read } = fakeDriver({ 4: { temperature: 21.4, humidity: 55.2 } });
			const controller = new AbortController();
			controller.abort();

			await runPollLoop(base({ driver }), controller.signal);

			expect(read).not.toHaveBeenCalled();
		});
	});
});
