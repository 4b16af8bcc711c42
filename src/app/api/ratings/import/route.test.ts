import { describe, expect, it } from "vitest";
import { POST } from "@/app/api/ratings/import/route";
import { SURVEY_HEADERS, surveyCsv } from "@/test/survey-fixture";

function upload(file?: File): Request {
    const form = new FormData();
    if (file) form.append("file", file);
    return new Request("http://localhost/api/ratings/import", { method: "POST", body: form });
}

describe("POST /api/ratings/import", () => {
    it("returns the table, its subject columns and default filters", async () => {
        const res = await POST(upload(new File([surveyCsv()], "responses.csv", { type: "text/csv" })));
        const data = await res.json();

        expect(res.status).toBe(200);
        expect(data.headers).toEqual(SURVEY_HEADERS);
        expect(data.rows).toHaveLength(4);
        expect(data.rows[1][5]).toBe("");
        expect(data.subjects).toEqual([
            {
                subject: "DBMS",
                columns: [
                    { index: 5, header: "Subject [DBMS]" },
                    { index: 6, header: "Subjects [ dbms ]" },
                ],
            },
            { subject: "OS", columns: [{ index: 7, header: "Subject [OS]" }] },
        ]);
        expect(data.filterOptions.gender).toEqual(["Female", "Male", null]);
    });

    it("requires a file", async () => {
        const res = await POST(upload());

        expect(res.status).toBe(400);
    });

    it("rejects unsupported files", async () => {
        const res = await POST(upload(new File(["name"], "notes.txt")));

        expect(res.status).toBe(422);
        expect((await res.json()).error).toBe("Unsupported file type: notes.txt. Upload a .csv or .xlsx export.");
    });
});
