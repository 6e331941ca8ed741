import type { Reading } from "../sensors/types";

export const OUTPUT_HEADER = ["date", "time", "temp_c", "temp_f", "humidity", "pin"] as const;
export const LINE_END = "\r\n";

export type SheetCell = string | number;

function pad2(n: number): string {
	return String(n).padStart(2, "0");
}

/** Local calendar date, e.g. 2026-01-15 */
export function formatDate(d: Date): string {
	return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
}

/** Local wall-clock time, e.g. 09:05:07 */
export function formatTime(d: Date): string {
	return `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

/** Same rounding as the output line's toFixed(1). */
export function round1(v: number): number {
	return Number(v.toFixed(1));
}

export function celsiusToFahrenheit(c: number): number {
	return (c * 9) / 5 + 32;
}

export function formatHeaderLine(): string {
	return OUTPUT_HEADER.join("\t") + LINE_END;
}

/**
 * date, time, temp_c, temp_f, humidity, pin (tab-separated, CRLF-terminated)
 */
export function formatOutputLine(r: Reading): string {
	const cells = [
		formatDate(r.timestamp),
		formatTime(r.timestamp),
		r.temperatureCelsius.toFixed(1),
		r.temperatureFahrenheit.toFixed(1),
		r.humidityPercent.toFixed(1),
		String(r.gpioPin)
	];
	return cells.join("\t") + LINE_END;
}

export function toSheetRow(r: Reading): SheetCell[] {
	return [
		formatDate(r.timestamp),
		round1(r.temperatureCelsius),
		round1(r.temperatureFahrenheit),
		round1(r.humidityPercent)
	];
}
