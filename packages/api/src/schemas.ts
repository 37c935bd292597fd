import { z } from 'zod';
import { HISTORY_DEFAULTS, NEWS_CATEGORIES, normalizeCategory } from '@newsroute/core';

export const QueryBodySchema = z
    .object({
        query: z.string().max(2_000).optional(),
        category: z
            .string()
            .optional()
            .refine((value) => !value?.trim() || normalizeCategory(value) !== null, {
                message: `category must be one of ${NEWS_CATEGORIES.join(', ')}`
            }),
        sessionId: z.string().trim().min(1, 'sessionId is required').max(200)
    })
    .refine((body) => Boolean(body.query?.trim()) || Boolean(body.category?.trim()), {
        message: 'query or category is required',
        path: ['query']
    });

export type QueryBody = z.infer<typeof QueryBodySchema>;

export const HistoryQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(HISTORY_DEFAULTS.MAX_LIMIT).default(HISTORY_DEFAULTS.LIMIT)
});

export interface ValidationIssue {
    path: string;
    message: string;
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
    return error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}
