import { describe, expect, it } from "vitest";
import { isScore, labelOf, scoreOf } from "@/lib/ratings/scale";

describe("scoreOf", () => {
    it("maps the five canonical labels to 5..1", () => {
        expect(scoreOf("Excellent")).toBe(5);
        expect(scoreOf("Very Good")).toBe(4);
        expect(scoreOf("Good")).toBe(3);
        expect(scoreOf("Fair")).toBe(2);
        expect(scoreOf("Poor")).toBe(1);
    });

    it("has no score for anything else", () => {
        expect(scoreOf("N/A")).toBeNull();
        expect(scoreOf("")).toBeNull();
        expect(scoreOf(null)).toBeNull();
        expect(scoreOf(undefined)).toBeNull();
    });

    it("matches labels exactly", () => {
        expect(scoreOf("excellent")).toBeNull();
        expect(scoreOf(" Good")).toBeNull();
    });
});

describe("labelOf", () => {
    it("is the inverse of scoreOf", () => {
        expect(labelOf(5)).toBe("Excellent");
        expect(labelOf(1)).toBe("Poor");
        expect(scoreOf(labelOf(4))).toBe(4);
    });
});

describe("isScore", () => {
    it("accepts integers 1 to 5 only", () => {
        expect(isScore(3)).toBe(true);
        expect(isScore(0)).toBe(false);
        expect(isScore(6)).toBe(false);
        expect(isScore(2.5)).toBe(false);
    });
});
