import { isValid, parse, parseISO } from "date-fns";
import { FILTER_DIMENSIONS, TIMESTAMP_FORMATS } from "@/lib/constants";
import { TableLoadError } from "@/lib/errors";
import type {
    FilterDimension,
    RawCell,
    RawTable,
    RowAttributes,
    SurveyColumnConfig,
    SurveyRow,
    SurveyTable,
} from "@/types";

const REFERENCE_DATE = new Date(2000, 0, 1);

/** Cell as text; blank or absent cells are null. */
export function cellText(value: RawCell | undefined): string | null {
    if (value == null) return null;
    if (value instanceof Date) return value.toISOString();
    if (typeof value === "string") return value.trim() === "" ? null : value;
    return String(value);
}

/**
 * Accepts Date cells, ISO-8601 text ("T" or space separated) and the
 * M/d/yyyy layouts of spreadsheet exports. Anything else is null.
 */
export function parseTimestamp(value: RawCell | undefined): Date | null {
    if (value instanceof Date) return isValid(value) ? value : null;
    if (typeof value !== "string") return null;

    const text = value.trim();
    if (text === "") return null;

    const iso = parseISO(text);
    if (isValid(iso)) return iso;

    for (const format of TIMESTAMP_FORMATS) {
        const parsed = parse(text, format, REFERENCE_DATE);
        if (isValid(parsed)) return parsed;
    }
    return null;
}

function findColumn(headers: readonly string[], name: string): number | null {
    const wanted = name.trim();
    const index = headers.findIndex(h => h.trim() === wanted);
    return index === -1 ? null : index;
}

/**
 * Turns a parsed table into survey rows.
 * The timestamp column is required and every row needs a valid timestamp;
 * a missing attribute column leaves that attribute unspecified on every row.
 */
export function toSurveyTable(raw: RawTable, columns: SurveyColumnConfig): SurveyTable {
    const timestampIndex = findColumn(raw.headers, columns.timestamp);
    if (timestampIndex === null) {
        throw new TableLoadError(`Missing required column "${columns.timestamp}".`);
    }

    const attributeIndexes = FILTER_DIMENSIONS.map(
        (dimension): [FilterDimension, number | null] => [dimension, findColumn(raw.headers, columns[dimension])]
    );

    const rows = raw.rows.map((record, i): SurveyRow => {
        const timestamp = parseTimestamp(record[timestampIndex]);
        if (timestamp === null) {
            throw new TableLoadError(
                `Row ${i + 1}: invalid timestamp ${JSON.stringify(cellText(record[timestampIndex]))}.`
            );
        }

        const attributes: RowAttributes = {
            yearSemester: null,
            gender: null,
            branch: null,
            sectionType: null,
        };
        for (const [dimension, index] of attributeIndexes) {
            attributes[dimension] = index === null ? null : cellText(record[index]);
        }

        return {
            timestamp,
            attributes,
            cells: raw.headers.map((_, c) => cellText(record[c])),
        };
    });

    return { headers: [...raw.headers], rows };
}

/** JSON-safe copy of a raw table: Date cells become ISO strings. */
export function serializeRawTable(raw: RawTable): { headers: string[]; rows: (string | number | boolean | null)[][] } {
    return {
        headers: raw.headers,
        rows: raw.rows.map(record => record.map(cell => (cell instanceof Date ? cell.toISOString() : cell))),
    };
}
