import { roundHalfUp } from "@/lib/ratings/distribution";
import type { SubjectKey, SubjectOverviewRow, SubjectStats } from "@/types";

/**
 * Subject performance overview, best average first.
 * Ordering uses the unrounded mean; equal means fall back to subject key.
 */
export function buildSubjectOverview(stats: ReadonlyMap<SubjectKey, SubjectStats>): SubjectOverviewRow[] {
    return [...stats.values()]
        .sort((a, b) => b.mean - a.mean || (a.subject < b.subject ? -1 : a.subject > b.subject ? 1 : 0))
        .map(s => ({
            subject: s.subject,
            averageScore: roundHalfUp(s.mean, 2),
            responses: s.count,
            responseRatePercent: roundHalfUp(s.responseRate * 100, 1),
        }));
}
