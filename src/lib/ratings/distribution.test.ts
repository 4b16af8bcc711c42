import { describe, expect, it } from "vitest";
import { roundHalfUp, summarizeScores } from "@/lib/ratings/distribution";
import type { Score } from "@/types";

describe("summarizeScores", () => {
    it("counts each score ascending with its share", () => {
        expect(summarizeScores([5, 5, 3, 1])).toEqual([
            { score: 1, count: 1, percentage: 25 },
            { score: 3, count: 1, percentage: 25 },
            { score: 5, count: 2, percentage: 50 },
        ]);
    });

    it("omits scores that never occur", () => {
        expect(summarizeScores([4, 4, 4]).map(e => e.score)).toEqual([4]);
    });

    it("rounds percentages to one decimal", () => {
        expect(summarizeScores([2, 3, 3])).toEqual([
            { score: 2, count: 1, percentage: 33.3 },
            { score: 3, count: 2, percentage: 66.7 },
        ]);
    });

    it("rounds exact halves up", () => {
        const scores: Score[] = [1, ...Array<Score>(15).fill(5)];
        expect(summarizeScores(scores)).toEqual([
            { score: 1, count: 1, percentage: 6.3 },
            { score: 5, count: 15, percentage: 93.8 },
        ]);
    });

    it("is empty for no scores", () => {
        expect(summarizeScores([])).toEqual([]);
    });
});

describe("roundHalfUp", () => {
    it("rounds halves away from zero", () => {
        expect(roundHalfUp(2.25, 1)).toBe(2.3);
        expect(roundHalfUp(2.5, 0)).toBe(3);
        expect(roundHalfUp(-2.5, 0)).toBe(-3);
        expect(roundHalfUp(3.14159, 2)).toBe(3.14);
    });
});
