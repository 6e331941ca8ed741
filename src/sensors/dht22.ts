import type { SensorConfig, SensorType } from "../lib/config";
import { configError, errorMessage, sensorError } from "../lib/errors";
import { celsiusToFahrenheit } from "../lib/format";
import { fail, ok } from "../lib/result";
import type { Result } from "../lib/result";
import type { DhtDriver, DhtSample, Reading, SensorModule } from "./types";

export const DHT22_KIND = 22;
export const DHT11_KIND = 11;

/**
 * Read one humidity/temperature pair and derive Fahrenheit.
 * A driver exception or a missing value yields a SENSOR_ERROR result.
 */
export async function readSensor(driver: DhtDriver, kind: number, pin: number, at: Date): Promise<Result<Reading>> {
	let sample: DhtSample;
	try {
		sample = await driver.read(kind, pin);
	} catch (err) {
		return fail(sensorError(`Sensor read failed on GPIO ${pin}: ${errorMessage(err)}`, { kind, pin }, err));
	}

	const { humidity, temperature } = sample;
	if (typeof humidity !== "number" || !Number.isFinite(humidity) || typeof temperature !== "number" || !Number.isFinite(temperature)) {
		return fail(
			sensorError(`Failed to retrieve data from sensor on GPIO ${pin}`, {
				kind,
				pin,
				humidity: humidity ?? null,
				temperature: temperature ?? null
			})
		);
	}

	return ok({
		timestamp: at,
		humidityPercent: humidity,
		temperatureCelsius: temperature,
		temperatureFahrenheit: celsiusToFahrenheit(temperature),
		gpioPin: pin
	});
}

/**
 * DHT-family sensor (DHT22 / AM2302 / DHT11) read through a DhtDriver.
 *
 * Config:
 * - gpioPin: BCM GPIO number (e.g. 4)
 */
function createDhtSensor(type: SensorType, kind: number): SensorModule {
	return {
		type,
		kind,

		validate(config: SensorConfig): void {
			if (!Number.isInteger(config.gpioPin) || config.gpioPin < 0) {
				throw configError(`${type}: gpio pin must be a valid BCM pin number (sensor '${config.fileId}')`);
			}
		},

		read(driver: DhtDriver, config: SensorConfig, at: Date): Promise<Result<Reading>> {
			return readSensor(driver, kind, config.gpioPin, at);
		}
	};
}

export const Dht22Sensor = createDhtSensor("dht22", DHT22_KIND);
export const Am2302Sensor = createDhtSensor("am2302", DHT22_KIND);
export const Dht11Sensor = createDhtSensor("dht11", DHT11_KIND);
