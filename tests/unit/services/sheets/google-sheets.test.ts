import { beforeEach, describe, it, expect, vi } from "vitest";

import {
  GoogleSheetsBackend,
  qualifiedRange,
} from "../../../../src/services/sheets/google-sheets.js";

const SPREADSHEET_ID = "sheet-123";

describe("services/sheets/google-sheets", () => {
  const get = vi.fn();
  const batchUpdate = vi.fn();
  const valuesGet = vi.fn();
  const valuesUpdate = vi.fn();
  let backend: GoogleSheetsBackend;

  beforeEach(() => {
    vi.resetAllMocks();
    backend = new GoogleSheetsBackend(
      {
        spreadsheets: {
          get,
          batchUpdate,
          values: { get: valuesGet, update: valuesUpdate },
        },
      },
      SPREADSHEET_ID
    );
  });

  describe("qualifiedRange", () => {
    it("should quote the sheet title", () => {
      expect(qualifiedRange("2024", "A1")).toBe("'2024'!A1");
    });

    it("should double quotes inside the title", () => {
      expect(qualifiedRange("Bob's", "1:1")).toBe("'Bob''s'!1:1");
    });
  });

  // ============================================================================
  // Sheets
  // ============================================================================

  describe("listDestinations", () => {
    it("should list sheets that have an id and a title", async () => {
      get.mockResolvedValue({
        data: {
          sheets: [
            { properties: { sheetId: 0, title: "Sheet1" } },
            { properties: { sheetId: 7, title: "2024" } },
            { properties: { title: "no-id" } },
          ],
        },
      });

      expect(await backend.listDestinations()).toEqual([
        { id: 0, title: "Sheet1" },
        { id: 7, title: "2024" },
      ]);
      expect(get).toHaveBeenCalledWith({
        spreadsheetId: SPREADSHEET_ID,
        fields: "sheets.properties(sheetId,title)",
      });
    });

    it("should return an empty list when the reply has no sheets", async () => {
      get.mockResolvedValue({ data: {} });

      expect(await backend.listDestinations()).toEqual([]);
    });
  });

  describe("createDestination", () => {
    it("should add a sheet and return its id", async () => {
      batchUpdate.mockResolvedValue({
        data: {
          replies: [{ addSheet: { properties: { sheetId: 42, title: "2024" } } }],
        },
      });

      expect(await backend.createDestination("2024")).toEqual({
        id: 42,
        title: "2024",
      });
      expect(batchUpdate).toHaveBeenCalledWith({
        spreadsheetId: SPREADSHEET_ID,
        requestBody: {
          requests: [{ addSheet: { properties: { title: "2024" } } }],
        },
      });
    });

    it("should fail when the reply carries no sheet id", async () => {
      batchUpdate.mockResolvedValue({ data: { replies: [{}] } });

      await expect(backend.createDestination("2024")).rejects.toThrow(
        'addSheet reply for "2024" carried no sheet id'
      );
    });
  });

  describe("freezeRows", () => {
    it("should update only the frozen row count", async () => {
      batchUpdate.mockResolvedValue({ data: {} });

      await backend.freezeRows(42, 1);

      expect(batchUpdate).toHaveBeenCalledWith({
        spreadsheetId: SPREADSHEET_ID,
        requestBody: {
          requests: [
            {
              updateSheetProperties: {
                properties: {
                  sheetId: 42,
                  gridProperties: { frozenRowCount: 1 },
                },
                fields: "gridProperties.frozenRowCount",
              },
            },
          ],
        },
      });
    });
  });

  // ============================================================================
  // Values
  // ============================================================================

  describe("getValues", () => {
    it("should read the qualified range and convert cells to strings", async () => {
      valuesGet.mockResolvedValue({
        data: { values: [["Temp", 68.5], [true, null]] },
      });

      expect(await backend.getValues("2024", "A:B")).toEqual([
        ["Temp", "68.5"],
        ["true", null],
      ]);
      expect(valuesGet).toHaveBeenCalledWith({
        spreadsheetId: SPREADSHEET_ID,
        range: "'2024'!A:B",
      });
    });

    it("should return no rows for an empty range", async () => {
      valuesGet.mockResolvedValue({ data: {} });

      expect(await backend.getValues("2024", "1:1")).toEqual([]);
    });
  });

  describe("updateValues", () => {
    it("should write raw values at the qualified range", async () => {
      valuesUpdate.mockResolvedValue({ data: {} });

      await backend.updateValues("2024", "A2", [["68.5", null, "72"]]);

      expect(valuesUpdate).toHaveBeenCalledWith({
        spreadsheetId: SPREADSHEET_ID,
        range: "'2024'!A2",
        valueInputOption: "RAW",
        requestBody: { values: [["68.5", null, "72"]] },
      });
    });
  });
});
