import { isValid, parseISO } from "date-fns";
import { z } from "zod";

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const dateSchema = z
    .string()
    .transform((value, ctx) => {
        const date = parseISO(value);
        if (!isValid(date)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` });
            return z.NEVER;
        }
        return date;
    });

const acceptedSchema = z.array(z.string().nullable());

export const surveyTableSchema = z
    .object({
        headers: z.array(z.string()).min(1),
        rows: z.array(z.array(cellSchema)),
    })
    .superRefine((table, ctx) => {
        table.rows.forEach((row, i) => {
            if (row.length > table.headers.length) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ["rows", i],
                    message: `Row has ${row.length} cells but the table has ${table.headers.length} headers`,
                });
            }
        });
    });

export const filterCriteriaSchema = z.object({
    from: dateSchema.optional(),
    to: dateSchema.optional(),
    yearSemester: acceptedSchema.optional(),
    gender: acceptedSchema.optional(),
    branch: acceptedSchema.optional(),
    sectionType: acceptedSchema.optional(),
});

export const filterOptionsSchema = z.object({
    table: surveyTableSchema,
});

export const analyzeRatingsSchema = z.object({
    table: surveyTableSchema,
    criteria: filterCriteriaSchema.optional().default({}),
    subjects: z.array(z.string()).optional(),
});

export type AnalyzeRatingsInput = z.infer<typeof analyzeRatingsSchema>;
export type FilterCriteriaInput = z.infer<typeof filterCriteriaSchema>;
