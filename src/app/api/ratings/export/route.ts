import { NextResponse } from "next/server";
import { EXPORT_FILE_NAME } from "@/lib/constants";
import { validateEnv, surveyColumnsFromEnv } from "@/lib/env";
import { handleRouteError } from "@/lib/errors";
import { analyzeRatings } from "@/lib/ratings/analysis";
import { overviewToCsv } from "@/lib/ratings/export";
import { resolveFilterCriteria } from "@/lib/ratings/filter";
import { loadSurveyIndex, toPartialCriteria } from "@/lib/ratings/request";
import { analyzeRatingsSchema } from "@/lib/validators";

// Subject performance overview for the current filters as a CSV download.

export async function POST(req: Request) {
    try {
        const body = await req.json();
        const validation = analyzeRatingsSchema.safeParse(body);

        if (!validation.success) {
            return NextResponse.json({ error: "Invalid Input", details: validation.error.format() }, { status: 400 });
        }

        const { table, criteria } = validation.data;
        const index = loadSurveyIndex(table, surveyColumnsFromEnv(validateEnv()));
        const analysis = analyzeRatings(index, resolveFilterCriteria(index.table.rows, toPartialCriteria(criteria)), {
            subjects: [],
        });

        return new NextResponse(overviewToCsv(analysis.overview), {
            status: 200,
            headers: {
                "Content-Type": "text/csv; charset=utf-8",
                "Content-Disposition": `attachment; filename="${EXPORT_FILE_NAME}"`,
            },
        });

    } catch (error) {
        return handleRouteError(error, "ratings/export");
    }
}
