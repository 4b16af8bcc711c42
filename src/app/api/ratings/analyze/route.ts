import { NextResponse } from "next/server";
import { validateEnv, surveyColumnsFromEnv } from "@/lib/env";
import { handleRouteError } from "@/lib/errors";
import { analyzeRatings } from "@/lib/ratings/analysis";
import { resolveFilterCriteria } from "@/lib/ratings/filter";
import { loadSurveyIndex, toPartialCriteria, toSubjectKeys } from "@/lib/ratings/request";
import { analyzeRatingsSchema } from "@/lib/validators";
import { createLogger } from "@/lib/logger";

const log = createLogger("ratings/analyze");

export async function POST(req: Request) {
    try {
        const body = await req.json();
        const validation = analyzeRatingsSchema.safeParse(body);

        if (!validation.success) {
            return NextResponse.json({ error: "Invalid Input", details: validation.error.format() }, { status: 400 });
        }

        const { table, criteria, subjects } = validation.data;
        const index = loadSurveyIndex(table, surveyColumnsFromEnv(validateEnv()));
        const resolved = resolveFilterCriteria(index.table.rows, toPartialCriteria(criteria));
        const analysis = analyzeRatings(index, resolved, { subjects: toSubjectKeys(subjects) });

        if (analysis.subjects.size === 0) {
            log.info("No subjects with scores found after filtering", { totalResponses: analysis.totalResponses });
        }

        return NextResponse.json({
            totalResponses: analysis.totalResponses,
            overview: analysis.overview,
            distributions: [...analysis.distributions].map(([subject, entries]) => ({ subject, entries })),
            scores: Object.fromEntries(
                [...analysis.subjects].map(([subject, stats]) => [subject, stats.scores])
            ),
        });

    } catch (error) {
        return handleRouteError(error, "ratings/analyze");
    }
}
