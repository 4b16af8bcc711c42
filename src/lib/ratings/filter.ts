import { endOfDay, isAfter, isBefore, startOfDay } from "date-fns";
import { FILTER_DIMENSIONS } from "@/lib/constants";
import { InvalidRangeError } from "@/lib/errors";
import type {
    CategoryValue,
    FilterCriteria,
    FilterDimension,
    PartialFilterCriteria,
    SurveyRow,
} from "@/types";

/**
 * Throws InvalidRangeError when the inclusive end of `to` precedes `from`.
 */
export function assertValidRange(from: Date, to: Date): void {
    if (isBefore(endOfDay(to), from)) {
        throw new InvalidRangeError(from, to);
    }
}

/**
 * Rows inside [from, end of `to`'s day] whose every attribute is accepted.
 * An empty accepted list for any dimension matches nothing; a missing
 * attribute only matches when `null` is accepted. Row order is kept.
 */
export function filterRows(rows: readonly SurveyRow[], criteria: FilterCriteria): SurveyRow[] {
    assertValidRange(criteria.from, criteria.to);

    const from = criteria.from;
    const to = endOfDay(criteria.to);
    const accepted = FILTER_DIMENSIONS.map(
        dimension => [dimension, new Set<CategoryValue>(criteria.accepted[dimension])] as const
    );

    return rows.filter(row => {
        if (isBefore(row.timestamp, from) || isAfter(row.timestamp, to)) return false;
        return accepted.every(([dimension, values]) => values.has(row.attributes[dimension]));
    });
}

// ============================================================
// Filter defaults (what an untouched filter form submits)
// ============================================================

function compareCategoryValues(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Sorted distinct values of one dimension, with `null` last when any row
 * lacks the attribute.
 */
export function distinctCategoryValues(
    rows: readonly SurveyRow[],
    dimension: FilterDimension
): CategoryValue[] {
    const values = new Set<string>();
    let hasUnspecified = false;

    for (const row of rows) {
        const value = row.attributes[dimension];
        if (value === null) {
            hasUnspecified = true;
        } else {
            values.add(value);
        }
    }

    const sorted: CategoryValue[] = [...values].sort(compareCategoryValues);
    if (hasUnspecified) sorted.push(null);
    return sorted;
}

/**
 * Criteria that keep every row: all observed values per dimension and the
 * days of the earliest and latest timestamps.
 */
export function defaultFilterCriteria(rows: readonly SurveyRow[]): FilterCriteria {
    let earliest: Date | null = null;
    let latest: Date | null = null;

    for (const { timestamp } of rows) {
        if (earliest === null || isBefore(timestamp, earliest)) earliest = timestamp;
        if (latest === null || isAfter(timestamp, latest)) latest = timestamp;
    }

    const epoch = new Date(0);

    return {
        from: startOfDay(earliest ?? epoch),
        to: startOfDay(latest ?? epoch),
        accepted: {
            yearSemester: distinctCategoryValues(rows, "yearSemester"),
            gender: distinctCategoryValues(rows, "gender"),
            branch: distinctCategoryValues(rows, "branch"),
            sectionType: distinctCategoryValues(rows, "sectionType"),
        },
    };
}

/**
 * Fills what the caller left out with the defaults.
 * An explicitly empty accepted list is kept as given.
 */
export function resolveFilterCriteria(
    rows: readonly SurveyRow[],
    partial: PartialFilterCriteria = {}
): FilterCriteria {
    const defaults = defaultFilterCriteria(rows);
    const accepted = partial.accepted ?? {};

    return {
        from: partial.from ?? defaults.from,
        to: partial.to ?? defaults.to,
        accepted: {
            yearSemester: accepted.yearSemester ?? defaults.accepted.yearSemester,
            gender: accepted.gender ?? defaults.accepted.gender,
            branch: accepted.branch ?? defaults.accepted.branch,
            sectionType: accepted.sectionType ?? defaults.accepted.sectionType,
        },
    };
}
