import { RATING_SCALE } from "@/lib/constants";
import type { RatingLabel, Score } from "@/types";

const SCORE_BY_LABEL = new Map<string, Score>(RATING_SCALE.map(r => [r.label, r.score]));
const LABEL_BY_SCORE = new Map<Score, RatingLabel>(RATING_SCALE.map(r => [r.score, r.label]));

/**
 * Score for a rating label (Excellent = 5 … Poor = 1).
 * Matching is exact; anything else, blank or missing, has no score.
 */
export function scoreOf(label: string | null | undefined): Score | null {
    if (label == null) return null;
    return SCORE_BY_LABEL.get(label) ?? null;
}

export function labelOf(score: Score): RatingLabel {
    const label = LABEL_BY_SCORE.get(score);
    if (label === undefined) {
        throw new RangeError(`No rating label for score ${score}`);
    }
    return label;
}

export function isScore(value: number): value is Score {
    return Number.isInteger(value) && value >= 1 && value <= 5;
}
