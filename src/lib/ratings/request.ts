import { format } from "date-fns";
import { createSurveyIndex } from "@/lib/ratings/analysis";
import { normalizeSubjectKey } from "@/lib/ratings/subject-key";
import { toSurveyTable } from "@/lib/table/rows";
import type { FilterCriteriaInput } from "@/lib/validators";
import type {
    FilterCriteria,
    FilterOptions,
    PartialFilterCriteria,
    RawTable,
    SubjectColumnIndex,
    SubjectColumnSummary,
    SubjectKey,
    SurveyColumnConfig,
    SurveyIndex,
} from "@/types";

// Glue between validated route payloads and the rating core.

export function loadSurveyIndex(raw: RawTable, columns: SurveyColumnConfig): SurveyIndex {
    return createSurveyIndex(toSurveyTable(raw, columns));
}

export function toPartialCriteria(input: FilterCriteriaInput): PartialFilterCriteria {
    return {
        from: input.from,
        to: input.to,
        accepted: {
            yearSemester: input.yearSemester,
            gender: input.gender,
            branch: input.branch,
            sectionType: input.sectionType,
        },
    };
}

export function toFilterOptions(criteria: FilterCriteria): FilterOptions {
    return {
        from: format(criteria.from, "yyyy-MM-dd"),
        to: format(criteria.to, "yyyy-MM-dd"),
        yearSemester: [...criteria.accepted.yearSemester],
        gender: [...criteria.accepted.gender],
        branch: [...criteria.accepted.branch],
        sectionType: [...criteria.accepted.sectionType],
    };
}

export function summarizeSubjectColumns(subjectColumns: SubjectColumnIndex): SubjectColumnSummary[] {
    return [...subjectColumns].map(([subject, columns]) => ({ subject, columns: [...columns] }));
}

/** Requested subject labels as keys; blank labels are dropped. */
export function toSubjectKeys(labels: readonly string[] | undefined): SubjectKey[] | undefined {
    if (!labels) return undefined;
    return labels
        .map(label => normalizeSubjectKey(label))
        .filter((key): key is SubjectKey => key !== null);
}
