/**
 * TabularBackend on the Google Sheets v4 API
 */

import { google, type Auth, type sheets_v4 } from "googleapis";

import { sheetsLogger } from "../../logger.js";

import type { Destination, TabularBackend } from "./backend.js";
import type { Cell, CellRows } from "../../types/index.js";

const VALUE_INPUT_OPTION = "RAW";

/** The part of the Sheets v4 client the backend calls */
export interface SheetsClient {
  spreadsheets: Pick<sheets_v4.Resource$Spreadsheets, "get" | "batchUpdate"> & {
    values: Pick<sheets_v4.Resource$Spreadsheets$Values, "get" | "update">;
  };
}

/**
 * Full A1 range with the sheet title quoted: `'2024'!A1`
 */
export function qualifiedRange(title: string, range: string): string {
  return `'${title.replaceAll("'", "''")}'!${range}`;
}

function toCell(value: unknown): Cell {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return null;
}

function toDestination(
  properties: sheets_v4.Schema$SheetProperties | undefined
): Destination | null {
  const id = properties?.sheetId;
  const title = properties?.title;
  if (id === undefined || id === null || title === undefined || title === null) {
    return null;
  }
  return { id, title };
}

export class GoogleSheetsBackend implements TabularBackend {
  constructor(
    private sheets: SheetsClient,
    private spreadsheetId: string
  ) {}

  static fromAuth(
    auth: Auth.OAuth2Client | Auth.JWT,
    spreadsheetId: string
  ): GoogleSheetsBackend {
    return new GoogleSheetsBackend(
      google.sheets({ version: "v4", auth }),
      spreadsheetId
    );
  }

  async listDestinations(): Promise<Destination[]> {
    const response = await this.sheets.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: "sheets.properties(sheetId,title)",
    });

    const destinations: Destination[] = [];
    for (const sheet of response.data.sheets ?? []) {
      const destination = toDestination(sheet.properties);
      if (destination !== null) destinations.push(destination);
    }
    return destinations;
  }

  async createDestination(title: string): Promise<Destination> {
    sheetsLogger.debug({ title }, "Requesting addSheet batch update");
    const response = await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: [{ addSheet: { properties: { title } } }],
      },
    });

    const created = toDestination(
      response.data.replies?.[0]?.addSheet?.properties
    );
    if (created === null) {
      throw new Error(`addSheet reply for "${title}" carried no sheet id`);
    }
    return created;
  }

  async freezeRows(destinationId: number, rowCount: number): Promise<void> {
    sheetsLogger.debug(
      { destinationId, rowCount },
      "Requesting frozen row batch update"
    );
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: [
          {
            updateSheetProperties: {
              properties: {
                sheetId: destinationId,
                gridProperties: { frozenRowCount: rowCount },
              },
              fields: "gridProperties.frozenRowCount",
            },
          },
        ],
      },
    });
  }

  async getValues(title: string, range: string): Promise<CellRows> {
    const response = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: qualifiedRange(title, range),
    });

    const values: unknown[][] = response.data.values ?? [];
    return values.map((row) => row.map(toCell));
  }

  async updateValues(
    title: string,
    range: string,
    rows: CellRows
  ): Promise<void> {
    await this.sheets.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range: qualifiedRange(title, range),
      valueInputOption: VALUE_INPUT_OPTION,
      requestBody: { values: rows },
    });
  }
}
