import { NextResponse } from "next/server";
import { createLogger } from "@/lib/logger";

const log = createLogger("api");

// --- Custom Error Classes ---

export class RatingAnalysisError extends Error {
    status: number;
    constructor(message: string, status: number = 500) {
        super(message);
        this.name = "RatingAnalysisError";
        this.status = status;
    }
}

/** Filter end date falls before its start date. */
export class InvalidRangeError extends RatingAnalysisError {
    constructor(from: Date, to: Date) {
        super(`Invalid date range: "to" (${to.toISOString()}) is earlier than "from" (${from.toISOString()})`, 400);
        this.name = "InvalidRangeError";
    }
}

/** The uploaded table cannot be turned into survey rows. */
export class TableLoadError extends RatingAnalysisError {
    constructor(message: string) {
        super(message, 422);
        this.name = "TableLoadError";
    }
}

// --- Route Error Handler ---

export function handleRouteError(error: unknown, route: string): NextResponse {
    if (error instanceof RatingAnalysisError) {
        log.warn(`${route} rejected: ${error.message}`);
        return NextResponse.json({ error: error.message }, { status: error.status });
    }

    log.error(`${route} failed`, error);
    const message = error instanceof Error ? error.message : "Unknown error";
    return NextResponse.json({ error: message }, { status: 500 });
}
