import Papa from "papaparse";
import type { SubjectOverviewRow } from "@/types";

const OVERVIEW_COLUMNS = ["Subject", "Average Score", "Number of Responses", "Response Rate (%)"];

/** Overview table as CSV text, one line per subject in overview order. */
export function overviewToCsv(overview: readonly SubjectOverviewRow[]): string {
    return Papa.unparse({
        fields: OVERVIEW_COLUMNS,
        data: overview.map(row => [row.subject, row.averageScore, row.responses, row.responseRatePercent]),
    });
}
