import fs from "node:fs";
import type winston from "winston";
import { google } from "googleapis";

import { errorMessage, remoteUploadError } from "./errors";
import type { SheetCell } from "./format";
import { fail, ok } from "./result";
import type { Result } from "./result";

const SHEETS_SCOPE = "https://www.googleapis.com/auth/spreadsheets";

/**
 * The two spreadsheet calls the uploader needs.
 */
export interface SheetsApi {
	firstSheetTitle(spreadsheetId: string): Promise<string>;
	appendRow(spreadsheetId: string, sheetTitle: string, row: readonly SheetCell[]): Promise<void>;
}

export type SheetsApiFactory = (credentialsPath: string) => SheetsApi;

export interface SheetUploader {
	appendRow(spreadsheetId: string, row: readonly SheetCell[]): Promise<Result<void>>;
}

export interface SheetUploaderOptions {
	/** Service-account key file (JSON) */
	credentialsPath: string;
	logger: winston.Logger;
	connect?: SheetsApiFactory;
}

/** A1 range naming a whole sheet: 'My Sheet' (quotes doubled inside). */
export function sheetRange(title: string): string {
	return `'${title.replace(/'/g, "''")}'`;
}

/**
 * SheetsApi backed by googleapis, authenticated with a service-account key file.
 */
export function createGoogleSheetsApi(credentialsPath: string): SheetsApi {
	const auth = new google.auth.GoogleAuth({
		keyFile: credentialsPath,
		scopes: [SHEETS_SCOPE]
	});
	const sheets = google.sheets({ version: "v4", auth });

	return {
		async firstSheetTitle(spreadsheetId: string): Promise<string> {
			const res = await sheets.spreadsheets.get({
				spreadsheetId,
				fields: "sheets.properties.title"
			});
			const title = res.data.sheets?.[0]?.properties?.title;
			if (!title) {
				throw new Error(`Spreadsheet ${spreadsheetId} has no sheets`);
			}
			return title;
		},

		async appendRow(spreadsheetId: string, sheetTitle: string, row: readonly SheetCell[]): Promise<void> {
			await sheets.spreadsheets.values.append({
				spreadsheetId,
				range: sheetRange(sheetTitle),
				valueInputOption: "RAW",
				insertDataOption: "INSERT_ROWS",
				requestBody: {
					values: [[...row]]
				}
			});
		}
	};
}

/**
 * Appends rows to the first sheet of a spreadsheet.
 *
 * Every call authenticates from scratch: the key file or the network may only
 * be available some of the time. Any failure comes back as one
 * REMOTE_UPLOAD_ERROR; there is no retry.
 */
export function createSheetUploader(opts: SheetUploaderOptions): SheetUploader {
	const connect = opts.connect ?? createGoogleSheetsApi;

	return {
		async appendRow(spreadsheetId: string, row: readonly SheetCell[]): Promise<Result<void>> {
			try {
				fs.accessSync(opts.credentialsPath, fs.constants.R_OK);
			} catch (err) {
				return fail(
					remoteUploadError(
						"Failed to upload to Google Sheets",
						{ spreadsheetId },
						new Error(`Service account key file ${opts.credentialsPath} not readable: ${errorMessage(err)}`)
					)
				);
			}

			try {
				const api = connect(opts.credentialsPath);
				const title = await api.firstSheetTitle(spreadsheetId);
				await api.appendRow(spreadsheetId, title, row);
				opts.logger.debug("Appended row to spreadsheet %s sheet '%s'", spreadsheetId, title);
				return ok(undefined);
			} catch (err) {
				return fail(remoteUploadError("Failed to upload to Google Sheets", { spreadsheetId }, err));
			}
		}
	};
}
