import Papa from "papaparse";
import * as XLSX from "xlsx";
import { TableLoadError } from "@/lib/errors";
import type { RawCell, RawTable } from "@/types";

function toRawCell(value: unknown): RawCell {
    if (value == null) return null;
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
    if (value instanceof Date) return value;
    return String(value);
}

/** First row becomes the headers; short rows are padded with nulls. */
function toRawTable(matrix: unknown[][]): RawTable {
    const [headerRow, ...body] = matrix;
    if (!headerRow || headerRow.length === 0) {
        throw new TableLoadError("The uploaded table has no header row.");
    }

    const headers = headerRow.map(h => (h == null ? "" : String(h)));
    const rows = body.map(record =>
        headers.map((_, i) => toRawCell(record[i]))
    );
    return { headers, rows };
}

/**
 * Parses CSV text in array mode so repeated headers stay distinct columns.
 */
export function parseCsvTable(text: string): RawTable {
    const results = Papa.parse<string[]>(text, { header: false, skipEmptyLines: true });

    const fatal = results.errors.find(e => e.type === "Quotes");
    if (fatal) {
        throw new TableLoadError(`Malformed CSV at row ${fatal.row ?? "?"}: ${fatal.message}`);
    }

    return toRawTable(results.data);
}

/**
 * Reads the first sheet of an Excel workbook. Date cells come back as Date.
 */
export function parseWorkbookTable(data: ArrayBuffer | Uint8Array): RawTable {
    const workbook = XLSX.read(data, { type: "array", cellDates: true });
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    if (!sheet) {
        throw new TableLoadError("The workbook contains no sheets.");
    }

    const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        defval: null,
        raw: true,
        blankrows: false,
    });
    return toRawTable(matrix);
}

/**
 * Picks the parser from the file extension.
 */
export async function loadUploadedTable(file: File, maxBytes: number): Promise<RawTable> {
    if (file.size > maxBytes) {
        throw new TableLoadError(`File is too large (${file.size} bytes, limit ${maxBytes}).`);
    }

    const name = file.name.toLowerCase();
    if (name.endsWith(".csv")) {
        return parseCsvTable(await file.text());
    }
    if (name.endsWith(".xlsx") || name.endsWith(".xls")) {
        return parseWorkbookTable(new Uint8Array(await file.arrayBuffer()));
    }

    throw new TableLoadError(`Unsupported file type: ${file.name}. Upload a .csv or .xlsx export.`);
}
