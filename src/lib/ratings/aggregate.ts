/**
 * Per-subject aggregation
 * - pools every column of a subject (column by column, rows in order)
 * - unscored labels never reach a sum, a count or a denominator
 * - subjects without a single valid score are left out
 */

import { scoreOf } from "@/lib/ratings/scale";
import type { Score, SubjectColumnIndex, SubjectKey, SubjectStats, SurveyRow } from "@/types";

export function computeMean(scores: readonly number[]): number | null {
    if (scores.length === 0) return null;
    return scores.reduce((a, b) => a + b, 0) / scores.length;
}

export function aggregateRatings(
    rows: readonly SurveyRow[],
    subjectColumns: SubjectColumnIndex
): Map<SubjectKey, SubjectStats> {
    const totalRows = rows.length;
    const result = new Map<SubjectKey, SubjectStats>();

    subjectColumns.forEach((columns, subject) => {
        const scores: Score[] = [];
        const answeredRows = new Set<number>();

        for (const column of columns) {
            rows.forEach((row, rowIndex) => {
                const score = scoreOf(row.cells[column.index]);
                if (score === null) return;
                scores.push(score);
                answeredRows.add(rowIndex);
            });
        }

        const mean = computeMean(scores);
        if (mean === null) return;

        result.set(subject, {
            subject,
            mean,
            count: scores.length,
            respondents: answeredRows.size,
            responseRate: answeredRows.size / totalRows,
            scores,
        });
    });

    return result;
}
