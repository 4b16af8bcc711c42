import type { SubjectKey } from "@/types";

/**
 * Canonical subject identity.
 * - null/undefined guard
 * - trims, collapses whitespace runs to one space, upper-cases
 * - blank labels have no identity
 */
export function normalizeSubjectKey(raw: string | null | undefined): SubjectKey | null {
    if (raw == null) return null;
    const key = raw.trim().split(/\s+/).join(" ").toUpperCase();
    return key.length > 0 ? key : null;
}
