import { describe, expect, it } from "vitest";
import { POST } from "@/app/api/ratings/export/route";
import { SURVEY_TABLE, jsonRequest } from "@/test/survey-fixture";

describe("POST /api/ratings/export", () => {
    it("downloads the overview as CSV", async () => {
        const res = await POST(jsonRequest("/api/ratings/export", { table: SURVEY_TABLE }));

        expect(res.status).toBe(200);
        expect(res.headers.get("Content-Type")).toBe("text/csv; charset=utf-8");
        expect(res.headers.get("Content-Disposition")).toBe('attachment; filename="faculty_rating_overview.csv"');
        expect(await res.text()).toBe(
            "Subject,Average Score,Number of Responses,Response Rate (%)\r\nDBMS,4,3,75\r\nOS,2,3,75"
        );
    });
});
