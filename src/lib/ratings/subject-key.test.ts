import { describe, expect, it } from "vitest";
import { normalizeSubjectKey } from "@/lib/ratings/subject-key";

describe("normalizeSubjectKey", () => {
    it("gives one key for differently written labels", () => {
        expect(normalizeSubjectKey(" dbms  ")).toBe("DBMS");
        expect(normalizeSubjectKey("DBMS")).toBe("DBMS");
        expect(normalizeSubjectKey("Dbms")).toBe("DBMS");
    });

    it("collapses internal whitespace runs", () => {
        expect(normalizeSubjectKey("  Data \t Structures\n Lab ")).toBe("DATA STRUCTURES LAB");
    });

    it("is idempotent", () => {
        const labels = ["Operating   Systems", " compiler design ", "DBMS", "a  b"];
        for (const label of labels) {
            const once = normalizeSubjectKey(label);
            expect(normalizeSubjectKey(once)).toBe(once);
        }
    });

    it("has no key for missing or blank labels", () => {
        expect(normalizeSubjectKey(null)).toBeNull();
        expect(normalizeSubjectKey(undefined)).toBeNull();
        expect(normalizeSubjectKey("   ")).toBeNull();
        expect(normalizeSubjectKey("")).toBeNull();
    });
});
