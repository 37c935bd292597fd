import { z } from 'zod';
import type { InteractionMetadata } from '@newsroute/core';

const ROUTES = ['news', 'search', 'qa'] as const;

/**
 * Shape of the metadata column as written by the runtime. Unknown keys are
 * dropped on read.
 */
export const InteractionMetadataSchema = z.object({
    route: z.enum(ROUTES).optional(),
    rule: z.enum(['search-keyword', 'question', 'explicit-category', 'category-mention', 'default']).optional(),
    resolvedCategory: z.enum(['business', 'entertainment', 'general', 'health', 'science', 'sports', 'technology']).optional(),
    source: z.enum(['live', 'fallback']).optional(),
    fallbackReason: z.string().optional(),
    error: z.object({ type: z.string(), message: z.string() }).optional(),
    latencyMs: z.number().optional(),
    requestId: z.string().optional()
}) satisfies z.ZodType<InteractionMetadata>;

export function parseMetadata(raw: string): InteractionMetadata {
    let value: unknown;
    try {
        value = JSON.parse(raw);
    } catch {
        return {};
    }
    const parsed = InteractionMetadataSchema.safeParse(value);
    return parsed.success ? parsed.data : {};
}

const RowIdSchema = z.union([z.number(), z.bigint()]);

export const InteractionRowSchema = z.object({
    id: RowIdSchema,
    session_id: z.string(),
    timestamp: z.string(),
    query: z.string(),
    category: z.string(),
    response: z.string(),
    metadata: z.string()
});

export const InsertedRowSchema = z.object({ id: RowIdSchema });

export const StatsRowSchema = z.object({
    total: z.number(),
    news: z.number(),
    search: z.number(),
    qa: z.number(),
    fallbacks: z.number(),
    errors: z.number()
});
