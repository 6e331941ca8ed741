import fs from "node:fs";
import path from "node:path";

import type { Reading } from "../sensors/types";
import { errorMessage, localWriteError } from "./errors";
import { formatHeaderLine, formatOutputLine } from "./format";
import { fail, ok } from "./result";
import type { Result } from "./result";

export interface OutputFile {
	readonly path: string;
	/** Open (or reopen) the file in append mode, writing the header if the file is empty. */
	open(): Result<void>;
	/** Append one record and flush it to disk. Reopens the file first if needed. */
	append(reading: Reading): Result<void>;
	close(): void;
}

function ensureDir(p: string): void {
	fs.mkdirSync(p, { recursive: true });
}

export function createOutputFile(filePath: string): OutputFile {
	let fd: number | null = null;

	const closeFd = (): void => {
		if (fd === null) return;
		const current = fd;
		fd = null;
		try {
			fs.closeSync(current);
		} catch {
			// descriptor is unusable either way
		}
	};

	const writeLine = (line: string): void => {
		if (fd === null) throw new Error("output file not open");
		fs.writeSync(fd, line);
		fs.fsyncSync(fd);
	};

	const open = (): Result<void> => {
		if (fd !== null) return ok(undefined);

		try {
			ensureDir(path.dirname(filePath));
			// "a": never truncates, every write lands at the end.
			fd = fs.openSync(filePath, "a");
			if (fs.fstatSync(fd).size === 0) {
				writeLine(formatHeaderLine());
			}
			return ok(undefined);
		} catch (err) {
			closeFd();
			return fail(localWriteError(`Cannot open output file ${filePath}: ${errorMessage(err)}`, { path: filePath }, err));
		}
	};

	const append = (reading: Reading): Result<void> => {
		const opened = open();
		if (!opened.ok) return opened;

		try {
			writeLine(formatOutputLine(reading));
			return ok(undefined);
		} catch (err) {
			// Reopen on the next attempt.
			closeFd();
			return fail(localWriteError(`Failed to write to ${filePath}: ${errorMessage(err)}`, { path: filePath }, err));
		}
	};

	return {
		path: filePath,
		open,
		append,
		close: closeFd
	};
}
