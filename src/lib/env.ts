import { z } from "zod";
import { DEFAULT_MAX_UPLOAD_BYTES, DEFAULT_SURVEY_COLUMNS } from "@/lib/constants";
import { createLogger } from "@/lib/logger";
import type { SurveyColumnConfig } from "@/types";

const log = createLogger("env");

/**
 * Environment variable validation.
 * Every variable is optional: the defaults match the standard survey export.
 */

const envSchema = z.object({
    SURVEY_TIMESTAMP_COLUMN: z.string().min(1).default(DEFAULT_SURVEY_COLUMNS.timestamp),
    SURVEY_YEAR_SEMESTER_COLUMN: z.string().min(1).default(DEFAULT_SURVEY_COLUMNS.yearSemester),
    SURVEY_GENDER_COLUMN: z.string().min(1).default(DEFAULT_SURVEY_COLUMNS.gender),
    SURVEY_BRANCH_COLUMN: z.string().min(1).default(DEFAULT_SURVEY_COLUMNS.branch),
    SURVEY_SECTION_TYPE_COLUMN: z.string().min(1).default(DEFAULT_SURVEY_COLUMNS.sectionType),
    MAX_UPLOAD_BYTES: z.coerce
        .number()
        .int("MAX_UPLOAD_BYTES must be an integer")
        .positive("MAX_UPLOAD_BYTES must be positive")
        .default(DEFAULT_MAX_UPLOAD_BYTES),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates environment variables.
 * Throws in production; elsewhere logs the issues and falls back to defaults.
 */
export function validateEnv(source: Record<string, string | undefined> = process.env): Env {
    const result = envSchema.safeParse(source);

    if (result.success) {
        return result.data;
    }

    const formatted = result.error.issues
        .map((i) => `  ${i.path.join(".")}: ${i.message}`)
        .join("\n");

    log.error(`Environment Configuration Error:\n${formatted}`);

    if (source.NODE_ENV === "production") {
        throw new Error("Invalid environment configuration. Check server logs.");
    }

    return envSchema.parse({});
}

export function surveyColumnsFromEnv(env: Env): SurveyColumnConfig {
    return {
        timestamp: env.SURVEY_TIMESTAMP_COLUMN,
        yearSemester: env.SURVEY_YEAR_SEMESTER_COLUMN,
        gender: env.SURVEY_GENDER_COLUMN,
        branch: env.SURVEY_BRANCH_COLUMN,
        sectionType: env.SURVEY_SECTION_TYPE_COLUMN,
    };
}
