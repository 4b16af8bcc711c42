import { aggregateRatings } from "@/lib/ratings/aggregate";
import { classifyColumns } from "@/lib/ratings/columns";
import { summarizeScores } from "@/lib/ratings/distribution";
import { filterRows } from "@/lib/ratings/filter";
import { buildSubjectOverview } from "@/lib/ratings/overview";
import type {
    ColumnRef,
    FilterCriteria,
    RatingAnalysis,
    ScoreDistributionEntry,
    SubjectColumnIndex,
    SubjectKey,
    SurveyIndex,
    SurveyTable,
} from "@/types";

export interface AnalyzeOptions {
    /** Subjects to summarize; all subjects with scores when omitted. */
    subjects?: readonly SubjectKey[];
}

/**
 * Pairs a loaded table with its column classification. The index is frozen
 * so one upload can serve any number of concurrent filter requests.
 */
export function createSurveyIndex(table: SurveyTable): SurveyIndex {
    const classified = classifyColumns(table.headers);
    const subjectColumns: SubjectColumnIndex = new Map(
        [...classified].map(([subject, columns]): [SubjectKey, readonly ColumnRef[]] => [
            subject,
            Object.freeze([...columns]),
        ])
    );
    return Object.freeze({ table, subjectColumns });
}

export function analyzeRatings(
    index: SurveyIndex,
    criteria: FilterCriteria,
    options: AnalyzeOptions = {}
): RatingAnalysis {
    const filtered = filterRows(index.table.rows, criteria);
    const subjects = aggregateRatings(filtered, index.subjectColumns);

    const selected = options.subjects ?? [...subjects.keys()];
    const distributions = new Map<SubjectKey, ScoreDistributionEntry[]>();
    for (const subject of selected) {
        const stats = subjects.get(subject);
        if (stats) distributions.set(subject, summarizeScores(stats.scores));
    }

    return {
        totalResponses: filtered.length,
        subjects,
        overview: buildSubjectOverview(subjects),
        distributions,
    };
}
