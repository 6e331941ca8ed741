import { configError } from "../lib/errors";
import type { SensorModule } from "./types";
import { Am2302Sensor, Dht11Sensor, Dht22Sensor } from "./dht22";

const registry = new Map<string, SensorModule>([
	[Dht22Sensor.type, Dht22Sensor],
	[Am2302Sensor.type, Am2302Sensor],
	[Dht11Sensor.type, Dht11Sensor]
]);

/**
 * Resolve a sensor module by sensor type.
 * Throws if the type is unsupported.
 */
export function getSensorModule(type: string): SensorModule {
	const mod = registry.get(type);
	if (!mod) {
		throw configError(`Unsupported sensor type '${type}'`);
	}
	return mod;
}
