import express, { Router, type NextFunction, type Request, type Response } from 'express';
import type { z } from 'zod';
import { errorMessage, type Logger } from '@newsroute/core';
import type { QueryRuntime } from '@newsroute/runtime';
import { HistoryQuerySchema, QueryBodySchema, toValidationIssues } from './schemas';

export type QueryService = Pick<
    QueryRuntime,
    'processRequest' | 'getHistory' | 'clearHistory' | 'getSessionStats' | 'sourceStatuses'
>;

export interface NewsrouteApiOptions {
    /** Optional static auth token. Every route except `/health` requires it when set. */
    authToken?: string | undefined;
    service: QueryService;
    logger?: Logger | undefined;
}

function sendValidationError(res: Response, error: z.ZodError): void {
    res.status(400).json({ status: 'error', message: 'Invalid request', issues: toValidationIssues(error) });
}

function isBodyParseError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';
}

/**
 * Creates an Express router with the query, history and health endpoints.
 */
export function createNewsrouteApi(options: NewsrouteApiOptions): Router {
    const router = Router();
    const { service, logger } = options;

    router.use(express.json({ limit: '32kb' }));

    // Middleware to enforce static auth token
    const requireAuth = (req: Request, res: Response, next: NextFunction): void => {
        if (!options.authToken) {
            next();
            return;
        }

        const queryToken = req.query.token;
        if (typeof queryToken === 'string' && queryToken === options.authToken) {
            next();
            return;
        }

        const authHeader = req.headers.authorization?.trim();
        if (authHeader && authHeader.startsWith('Bearer ')) {
            const token = authHeader.slice('Bearer '.length);
            if (token === options.authToken) {
                next();
                return;
            }
        }

        res.status(401).json({ status: 'error', message: 'Unauthorized' });
    };

    const failWith = (res: Response, error: unknown, action: string): void => {
        logger?.error({ err: error, reason: errorMessage(error) }, `Failed to ${action}`);
        res.status(500).json({ status: 'error', message: `Failed to ${action}` });
    };

    // Health check endpoint (always accessible)
    router.get('/health', (_req, res) => {
        res.json({ status: 'ok', sources: service.sourceStatuses() });
    });

    router.post('/query', requireAuth, async (req, res) => {
        const parsed = QueryBodySchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            sendValidationError(res, parsed.error);
            return;
        }

        try {
            const result = await service.processRequest(parsed.data);
            res.json({
                response: result.response,
                route: result.decision?.route ?? null,
                resolvedCategory: result.decision?.resolvedCategory ?? null,
                interactionId: result.interaction?.id ?? null,
                persisted: result.persisted
            });
        } catch (error) {
            failWith(res, error, 'process query');
        }
    });

    router.get('/sessions/:sessionId/history', requireAuth, async (req, res) => {
        const parsed = HistoryQuerySchema.safeParse({ limit: req.query.limit });
        if (!parsed.success) {
            sendValidationError(res, parsed.error);
            return;
        }

        const { sessionId } = req.params;
        try {
            const interactions = await service.getHistory(sessionId, parsed.data.limit);
            res.json({ sessionId, interactions });
        } catch (error) {
            failWith(res, error, 'load history');
        }
    });

    router.delete('/sessions/:sessionId/history', requireAuth, async (req, res) => {
        const { sessionId } = req.params;
        try {
            const removed = await service.clearHistory(sessionId);
            res.json({ sessionId, removed });
        } catch (error) {
            failWith(res, error, 'clear history');
        }
    });

    router.get('/sessions/:sessionId/stats', requireAuth, async (req, res) => {
        try {
            res.json(await service.getSessionStats(req.params.sessionId));
        } catch (error) {
            failWith(res, error, 'load session stats');
        }
    });

    router.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
        if (isBodyParseError(error)) {
            res.status(400).json({ status: 'error', message: 'Request body is not valid JSON', issues: [] });
            return;
        }
        next(error);
    });

    return router;
}
