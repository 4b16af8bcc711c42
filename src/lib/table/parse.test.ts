import { describe, expect, it } from "vitest";
import * as XLSX from "xlsx";
import { TableLoadError } from "@/lib/errors";
import { loadUploadedTable, parseCsvTable, parseWorkbookTable } from "@/lib/table/parse";

const CSV = [
    "Timestamp,Gender,Subject [DBMS],Subjects [ dbms ]",
    "2024-01-15 10:30:00,Female,Good,",
    "",
    "2024-01-16 09:00:00,,Poor,Fair",
    "",
].join("\n");

function workbookBytes(rows: (string | number | null)[][]): ArrayBuffer {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), "Form Responses 1");
    const bytes: ArrayBuffer = XLSX.write(workbook, { type: "array", bookType: "xlsx" });
    return bytes;
}

describe("parseCsvTable", () => {
    it("keeps repeated headers as separate columns and skips blank lines", () => {
        expect(parseCsvTable(CSV)).toEqual({
            headers: ["Timestamp", "Gender", "Subject [DBMS]", "Subjects [ dbms ]"],
            rows: [
                ["2024-01-15 10:30:00", "Female", "Good", ""],
                ["2024-01-16 09:00:00", "", "Poor", "Fair"],
            ],
        });
    });

    it("pads short records with nulls", () => {
        expect(parseCsvTable("a,b,c\n1,2\n").rows).toEqual([["1", "2", null]]);
    });

    it("rejects an empty file", () => {
        expect(() => parseCsvTable("")).toThrow(TableLoadError);
    });
});

describe("parseWorkbookTable", () => {
    it("reads the first sheet with its first row as headers", () => {
        const bytes = workbookBytes([
            ["Timestamp", "Subject [OS]", "Attempts"],
            ["2024-01-15 10:30:00", "Very Good", 2],
            ["2024-01-16 09:00:00", null, 1],
        ]);

        expect(parseWorkbookTable(bytes)).toEqual({
            headers: ["Timestamp", "Subject [OS]", "Attempts"],
            rows: [
                ["2024-01-15 10:30:00", "Very Good", 2],
                ["2024-01-16 09:00:00", null, 1],
            ],
        });
    });
});

describe("loadUploadedTable", () => {
    it("parses CSV uploads", async () => {
        const table = await loadUploadedTable(new File([CSV], "responses.CSV"), 1024);
        expect(table.rows).toHaveLength(2);
    });

    it("parses Excel uploads", async () => {
        const bytes = workbookBytes([["Timestamp", "Subject [OS]"], ["2024-01-15 10:30:00", "Good"]]);
        const table = await loadUploadedTable(new File([bytes], "responses.xlsx"), 1024 * 1024);
        expect(table.headers).toEqual(["Timestamp", "Subject [OS]"]);
    });

    it("rejects other file types", async () => {
        await expect(loadUploadedTable(new File(["{}"], "responses.json"), 1024))
            .rejects.toThrow("Unsupported file type: responses.json. Upload a .csv or .xlsx export.");
    });

    it("rejects files over the size limit", async () => {
        await expect(loadUploadedTable(new File([CSV], "responses.csv"), 10))
            .rejects.toBeInstanceOf(TableLoadError);
    });
});
