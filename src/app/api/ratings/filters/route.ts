import { NextResponse } from "next/server";
import { validateEnv, surveyColumnsFromEnv } from "@/lib/env";
import { handleRouteError } from "@/lib/errors";
import { defaultFilterCriteria } from "@/lib/ratings/filter";
import { loadSurveyIndex, toFilterOptions } from "@/lib/ratings/request";
import { filterOptionsSchema } from "@/lib/validators";

// Default filter selection for a table: every observed value per dimension
// and the observed date span.

export async function POST(req: Request) {
    try {
        const body = await req.json();
        const validation = filterOptionsSchema.safeParse(body);

        if (!validation.success) {
            return NextResponse.json({ error: "Invalid Input", details: validation.error.format() }, { status: 400 });
        }

        const index = loadSurveyIndex(validation.data.table, surveyColumnsFromEnv(validateEnv()));

        return NextResponse.json({
            filterOptions: toFilterOptions(defaultFilterCriteria(index.table.rows)),
        });

    } catch (error) {
        return handleRouteError(error, "ratings/filters");
    }
}
