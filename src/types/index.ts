/**
 * Shared TypeScript types for the faculty rating analysis core and API.
 */

// --- Rating Scale ---

export type RatingLabel = "Excellent" | "Very Good" | "Good" | "Fair" | "Poor";

export type Score = 1 | 2 | 3 | 4 | 5;

// --- Subjects & Columns ---

/** Canonical subject identity: trimmed, whitespace-collapsed, upper-cased. */
export type SubjectKey = string;

export interface ColumnRef {
    index: number;
    header: string;
}

export interface SubjectColumn {
    subject: SubjectKey;
    column: ColumnRef;
}

export type SubjectColumnIndex = ReadonlyMap<SubjectKey, readonly ColumnRef[]>;

// --- Table Model ---

/** A cell exactly as a parser produced it. */
export type RawCell = string | number | boolean | Date | null;

export interface RawTable {
    headers: string[];
    rows: RawCell[][];
}

export type FilterDimension = "yearSemester" | "gender" | "branch" | "sectionType";

/** `null` is the explicit "unspecified" category for a missing attribute. */
export type CategoryValue = string | null;

export type RowAttributes = Record<FilterDimension, CategoryValue>;

export interface SurveyRow {
    timestamp: Date;
    attributes: RowAttributes;
    /** One entry per table header, aligned by column index. */
    cells: readonly (string | null)[];
}

export interface SurveyTable {
    headers: readonly string[];
    rows: readonly SurveyRow[];
}

export interface SurveyIndex {
    table: SurveyTable;
    subjectColumns: SubjectColumnIndex;
}

export interface SurveyColumnConfig {
    timestamp: string;
    yearSemester: string;
    gender: string;
    branch: string;
    sectionType: string;
}

// --- Filtering ---

export interface FilterCriteria {
    from: Date;
    /** Inclusive through the last instant of this calendar day. */
    to: Date;
    accepted: Record<FilterDimension, readonly CategoryValue[]>;
}

export type PartialFilterCriteria = {
    from?: Date;
    to?: Date;
    accepted?: Partial<Record<FilterDimension, readonly CategoryValue[]>>;
};

// --- Aggregation Results ---

export interface SubjectStats {
    subject: SubjectKey;
    mean: number;
    /** Number of valid scores pooled across the subject's columns. */
    count: number;
    /** Filtered rows holding at least one valid score for the subject. */
    respondents: number;
    /** respondents / total filtered rows, in [0, 1]. */
    responseRate: number;
    scores: Score[];
}

export interface ScoreDistributionEntry {
    score: Score;
    count: number;
    percentage: number;
}

export interface SubjectOverviewRow {
    subject: SubjectKey;
    averageScore: number;
    responses: number;
    responseRatePercent: number;
}

export interface RatingAnalysis {
    totalResponses: number;
    subjects: Map<SubjectKey, SubjectStats>;
    overview: SubjectOverviewRow[];
    distributions: Map<SubjectKey, ScoreDistributionEntry[]>;
}

// --- API Payloads ---

export interface FilterOptions {
    from: string;
    to: string;
    yearSemester: CategoryValue[];
    gender: CategoryValue[];
    branch: CategoryValue[];
    sectionType: CategoryValue[];
}

export interface SubjectColumnSummary {
    subject: SubjectKey;
    columns: ColumnRef[];
}
