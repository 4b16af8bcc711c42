import { SUBJECT_HEADER_MARKERS } from "@/lib/constants";
import { normalizeSubjectKey } from "@/lib/ratings/subject-key";
import type { ColumnRef, SubjectColumn, SubjectKey } from "@/types";

/**
 * Text between the first `[` and the first `]` of a rating header,
 * or null when the header does not rate a subject.
 */
export function extractBracketedLabel(header: string): string | null {
    if (!SUBJECT_HEADER_MARKERS.some(marker => header.includes(marker))) {
        return null;
    }

    const open = header.indexOf("[");
    const close = header.indexOf("]");
    if (close <= open) return null;

    return header.slice(open + 1, close);
}

export function parseRatingHeader(header: string, index: number): SubjectColumn | null {
    const subject = normalizeSubjectKey(extractBracketedLabel(header));
    if (subject === null) return null;
    return { subject, column: { index, header } };
}

/**
 * Groups rating columns by subject.
 * Keys appear in the order their first column appears; each key's columns
 * keep header order. Depends on header text only, never on row values.
 */
export function classifyColumns(headers: readonly string[]): Map<SubjectKey, ColumnRef[]> {
    const bySubject = new Map<SubjectKey, ColumnRef[]>();

    headers.forEach((header, index) => {
        const parsed = parseRatingHeader(header, index);
        if (!parsed) return;

        const columns = bySubject.get(parsed.subject);
        if (columns) {
            columns.push(parsed.column);
        } else {
            bySubject.set(parsed.subject, [parsed.column]);
        }
    });

    return bySubject;
}
