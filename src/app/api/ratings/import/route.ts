import { NextResponse } from "next/server";
import { validateEnv, surveyColumnsFromEnv } from "@/lib/env";
import { handleRouteError } from "@/lib/errors";
import { defaultFilterCriteria } from "@/lib/ratings/filter";
import { loadSurveyIndex, summarizeSubjectColumns, toFilterOptions } from "@/lib/ratings/request";
import { loadUploadedTable } from "@/lib/table/parse";
import { serializeRawTable } from "@/lib/table/rows";
import { createLogger } from "@/lib/logger";

const log = createLogger("ratings/import");

// Parses an uploaded survey export and returns the table together with the
// discovered subject columns and the default filter selection.

export async function POST(req: Request) {
    try {
        const env = validateEnv();
        const form = await req.formData();
        const file = form.get("file");

        if (file === null || typeof file === "string") {
            return NextResponse.json({ error: "Invalid Input", details: "Expected a file in the \"file\" field" }, { status: 400 });
        }

        const raw = await loadUploadedTable(file, env.MAX_UPLOAD_BYTES);
        const index = loadSurveyIndex(raw, surveyColumnsFromEnv(env));

        log.info(`Loaded ${file.name}`, {
            rows: index.table.rows.length,
            subjects: index.subjectColumns.size,
        });

        return NextResponse.json({
            ...serializeRawTable(raw),
            subjects: summarizeSubjectColumns(index.subjectColumns),
            filterOptions: toFilterOptions(defaultFilterCriteria(index.table.rows)),
        });

    } catch (error) {
        return handleRouteError(error, "ratings/import");
    }
}
