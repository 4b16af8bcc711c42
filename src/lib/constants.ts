// Global Constants for the Faculty Rating Analysis core

import type { FilterDimension, RatingLabel, Score, SurveyColumnConfig } from "@/types";

/**
 * RATING_SCALE
 * The closed set of rating labels respondents pick from, best first.
 * Any label outside this table carries no score.
 */
export const RATING_SCALE: ReadonlyArray<{ label: RatingLabel; score: Score }> = [
    { label: "Excellent", score: 5 },
    { label: "Very Good", score: 4 },
    { label: "Good", score: 3 },
    { label: "Fair", score: 2 },
    { label: "Poor", score: 1 },
];

/** A header rates a subject when it contains one of these followed by a `]`. */
export const SUBJECT_HEADER_MARKERS = ["Subject [", "Subjects ["] as const;

export const FILTER_DIMENSIONS: readonly FilterDimension[] = [
    "yearSemester",
    "gender",
    "branch",
    "sectionType",
];

/** Header names used by the Google Forms export the tool was built around. */
export const DEFAULT_SURVEY_COLUMNS: SurveyColumnConfig = {
    timestamp: "Timestamp",
    yearSemester: "Choose your Current/Last Academic Year and Semester",
    gender: "Gender",
    branch: "Select Branch/Discipline",
    sectionType: "Section Type",
};

/** Non-ISO timestamp layouts tried after ISO-8601, in order (date-fns tokens). */
export const TIMESTAMP_FORMATS = ["M/d/yyyy H:mm:ss", "M/d/yyyy H:mm", "M/d/yyyy"] as const;

export const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

export const EXPORT_FILE_NAME = "faculty_rating_overview.csv";
