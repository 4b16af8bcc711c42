import type { Score, ScoreDistributionEntry } from "@/types";

/**
 * Rounds half away from zero at `decimals` places (2.25 → 2.3, 6.25 → 6.3).
 * The epsilon nudge keeps binary artefacts such as 1.005 from rounding down.
 */
export function roundHalfUp(value: number, decimals: number): number {
    const factor = 10 ** decimals;
    const scaled = Math.abs(value) * factor;
    const rounded = Math.round(scaled + scaled * Number.EPSILON) / factor;
    return value < 0 ? -rounded : rounded;
}

/**
 * Count and share of each score that occurs, ascending by score.
 * Percentages are 100 * count / total, rounded half-up to one decimal.
 */
export function summarizeScores(scores: readonly Score[]): ScoreDistributionEntry[] {
    const counts = new Map<Score, number>();
    for (const score of scores) {
        counts.set(score, (counts.get(score) ?? 0) + 1);
    }

    const total = scores.length;
    return [...counts.entries()]
        .sort(([a], [b]) => a - b)
        .map(([score, count]) => ({
            score,
            count,
            percentage: roundHalfUp((100 * count) / total, 1),
        }));
}
