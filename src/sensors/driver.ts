import type { DhtDriver, DhtSample } from "./types";

/**
 * node-dht-sensor native addon (CommonJS)
 */
export type NodeDhtSensor = {
	read: (
		type: number,
		gpio: number,
		cb: (err: unknown, temperature: number, humidity: number) => void
	) => void;
};

const MAX_ATTEMPTS = 3;
const RETRY_DELAY_MS = 500;

function isNodeDhtSensor(mod: unknown): mod is NodeDhtSensor {
	return typeof mod === "object" && mod !== null && "read" in mod && typeof mod.read === "function";
}

export function loadNodeDhtSensor(): NodeDhtSensor {
	let mod: unknown;
	try {
		// Optional native addon; only present on the board itself.
		mod = require("node-dht-sensor");
	} catch (err) {
		throw new Error("node-dht-sensor is not installed or failed to load", { cause: err });
	}

	if (isNodeDhtSensor(mod)) return mod;
	if (typeof mod === "object" && mod !== null && "default" in mod && isNodeDhtSensor(mod.default)) {
		return mod.default;
	}
	throw new Error("node-dht-sensor does not expose read()");
}

function readOnce(lib: NodeDhtSensor, kind: number, gpio: number): Promise<DhtSample> {
	return new Promise<DhtSample>((resolve, reject) => {
		lib.read(kind, gpio, (err, temperature, humidity) => {
			if (err) return reject(err instanceof Error ? err : new Error(String(err)));
			resolve({ temperature, humidity });
		});
	});
}

async function readWithRetries(lib: NodeDhtSensor, kind: number, gpio: number): Promise<DhtSample> {
	let last: DhtSample = {};
	let lastErr: unknown = null;

	for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
		try {
			last = await readOnce(lib, kind, gpio);
			lastErr = null;
			if (Number.isFinite(last.temperature) && Number.isFinite(last.humidity)) {
				return last;
			}
		} catch (e) {
			lastErr = e;
		}

		if (attempt < MAX_ATTEMPTS) {
			await new Promise(r => setTimeout(r, RETRY_DELAY_MS));
		}
	}

	if (lastErr !== null) {
		throw lastErr instanceof Error ? lastErr : new Error("node-dht-sensor read failed");
	}
	return last;
}

/**
 * Driver backed by node-dht-sensor. The addon is loaded on first read so the
 * rest of the program (and its tests) run on machines without GPIO.
 */
export function createNodeDhtDriver(load: () => NodeDhtSensor = loadNodeDhtSensor): DhtDriver {
	let lib: NodeDhtSensor | null = null;

	return {
		async read(kind: number, pin: number): Promise<DhtSample> {
			lib ??= load();
			return readWithRetries(lib, kind, pin);
		}
	};
}
