import type { SensorConfig, SensorType } from "../lib/config";
import type { Result } from "../lib/result";

/**
 * One humidity/temperature sample as produced for a single sensor in one poll cycle.
 */
export interface Reading {
	timestamp: Date;
	humidityPercent: number;
	temperatureCelsius: number;
	temperatureFahrenheit: number;
	gpioPin: number;
}

/**
 * Raw driver output. Either value may be missing or non-finite when the
 * sensor did not answer.
 */
export interface DhtSample {
	temperature?: number | null;
	humidity?: number | null;
}

/**
 * Blocking hardware read of a DHT-family sensor.
 * - kind: driver sensor type (11 or 22)
 * - pin: BCM GPIO number
 * Retries, if any, are the driver's own business.
 */
export interface DhtDriver {
	read(kind: number, pin: number): Promise<DhtSample>;
}

/**
 * SensorModule defines the contract that all sensor implementations must follow.
 * - type: sensor model name used in config files
 * - kind: numeric type handed to the driver
 * - validate: validates sensor-specific configuration
 * - read: reads a single sample (one-shot), never throws
 */
export interface SensorModule {
	readonly type: SensorType;
	readonly kind: number;

	/**
	 * Should throw a CONFIG_ERROR on invalid configuration.
	 */
	validate(config: SensorConfig): void;

	read(driver: DhtDriver, config: SensorConfig, at: Date): Promise<Result<Reading>>;
}
