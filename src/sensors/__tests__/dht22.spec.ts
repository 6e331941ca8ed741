import { describe, expect, it, vi } from "vitest";

import type { SensorConfig } from "../../lib/config";
import { AppError } from "../../lib/errors";
import { getSensorModule } from "../index";
import { readSensor } from "../dht22";
import type { DhtDriver, DhtSample } from "../types";

const AT = new Date(2026, 0, 15, 9, 5, 7);

function driverReturning(sample: DhtSample) {
	const read = vi.fn(async (_kind: number, _pin: number): Promise<DhtSample> => sample);
	const driver: DhtDriver = { read };
	return { driver, read };
}

function sensor(overrides: Partial<SensorConfig> = {}): SensorConfig {
	return {
		fileId: "home_livingroom",
		sensorName: "home_livingroom",
		spreadsheetId: "ABC123",
		gpioPin: 4,
		type: "dht22",
		...overrides
	};
}

describe("dht22", () => {
	it("returns a reading with derived fahrenheit", async () => {
		const { driver, read } = driverReturning({ temperature: 21.4, humidity: 55.2 });

		const res = await readSensor(driver, 22, 4, AT);

		expect(read).toHaveBeenCalledWith(22, 4);
		expect(res).toEqual({
			ok: true,
			value: {
				timestamp: AT,
				humidityPercent: 55.2,
				temperatureCelsius: 21.4,
				temperatureFahrenheit: (21.4 * 9) / 5 + 32,
				gpioPin: 4
			}
		});
	});

	it.each<[string, DhtSample]>([
		["missing humidity", { temperature: 21.4 }],
		["null temperature", { temperature: null, humidity: 55.2 }],
		["NaN temperature", { temperature: Number.NaN, humidity: 55.2 }],
		["nothing at all", {}]
	])("yields no reading for %s", async (_label, sample) => {
		const { driver } = driverReturning(sample);

		const res = await readSensor(driver, 22, 4, AT);

		expect(res.ok).toBe(false);
		if (!res.ok) {
			expect(res.error.code).toBe("SENSOR_ERROR");
			expect(res.error.message).toBe("Failed to retrieve data from sensor on GPIO 4");
		}
	});

	it("turns a driver exception into a failed result", async () => {
		const driver: DhtDriver = {
			read: async () => {
				throw new Error("checksum error");
			}
		};

		const res = await readSensor(driver, 22, 17, AT);

		expect(res.ok).toBe(false);
		if (!res.ok) {
			expect(res.error.message).toBe("Sensor read failed on GPIO 17: checksum error");
			expect(res.error.details).toEqual({ kind: 22, pin: 17 });
		}
	});

	it("maps sensor types to driver kinds", () => {
		expect(getSensorModule("dht22").kind).toBe(22);
		expect(getSensorModule("am2302").kind).toBe(22);
		expect(getSensorModule("dht11").kind).toBe(11);
		expect(() => getSensorModule("bmp280")).toThrow("Unsupported sensor type 'bmp280'");
	});

	it("reads through the module with the module's kind", async () => {
		const { driver, read } = driverReturning({ temperature: 18, humidity: 40 });

		const res = await getSensorModule("dht11").read(driver, sensor({ type: "dht11", gpioPin: 27 }), AT);

		expect(read).toHaveBeenCalledWith(11, 27);
		expect(res.ok).toBe(true);
	});

	it("validates the gpio pin", () => {
		const mod = getSensorModule("dht22");

		expect(() => mod.validate(sensor())).not.toThrow();
		expect(() => mod.validate(sensor({ gpioPin: -1 }))).toThrow(AppError);
		expect(() => mod.validate(sensor({ gpioPin: 4.5 }))).toThrow(
			"dht22: gpio pin must be a valid BCM pin number (sensor 'home_livingroom')"
		);
	});
});
