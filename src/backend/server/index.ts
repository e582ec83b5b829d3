/**
 * Express Server Configuration and Routes
 *
 * HTTP layer over the application context. It exposes REST endpoints for:
 * - Questions (RAG query) and similarity search
 * - Ingestion (file upload, web page)
 * - Collection statistics and clearing
 * - Health and backend failover reset
 *
 * Handlers only validate requests and shape responses; every decision lives
 * in the services. Errors end in the central error middleware, which never
 * returns internal details.
 */

import * as fs from 'fs';
import * as http from 'http';
import * as path from 'path';
import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { z } from 'zod';
import { HealthResponse, QueryRequest, UrlIngestRequest } from '../../shared/types';
import { AppContext } from '../context';
import { SUPPORTED_EXTENSIONS, detectSourceType } from '../extractors';
import { validateQuery } from '../services/queryProcessor';
import { createLogger, errorFields } from '../utils/logger';

const log = createLogger('http');

/** Largest accepted upload */
const MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

/** Most records a similarity search may return */
export const MAX_SIMILAR_LIMIT = 50;

const queryRequestSchema: z.ZodType<QueryRequest> = z.object({
    question: z.string(),
});

const similarLimitSchema = z.coerce.number().int().min(1).max(MAX_SIMILAR_LIMIT).optional();

const urlIngestRequestSchema: z.ZodType<UrlIngestRequest> = z.object({
    url: z.string().trim().min(1),
});

/**
 * Uploads are staged under their original file name so a re-upload replaces
 * the earlier records of the same file.
 */
function createUploadMiddleware(uploadDir: string): multer.Multer {
    return multer({
        storage: multer.diskStorage({
            destination: (_req, _file, callback) => {
                fs.promises
                    .mkdir(uploadDir, { recursive: true })
                    .then(() => callback(null, uploadDir))
                    .catch((error: Error) => callback(error, uploadDir));
            },
            filename: (_req, file, callback) => {
                callback(null, path.basename(file.originalname));
            },
        }),
        limits: {
            fileSize: MAX_UPLOAD_BYTES,
        },
        fileFilter: (_req, file, callback) => {
            callback(null, detectSourceType(file.originalname) !== null);
        },
    });
}

/**
 * The parts of the application context the routes use.
 */
export type ServerContext = Pick<AppContext, 'config' | 'ragEngine' | 'ingestion' | 'router'>;

/**
 * Creates and configures the Express application.
 * Listening is separate so tests can mount the app on an ephemeral port.
 */
export function createApp(context: ServerContext): Express {
    const { config, ragEngine, ingestion } = context;
    const app = express();
    const upload = createUploadMiddleware(config.uploadDir);

    // =========================================================================
    // Middleware Setup
    // =========================================================================

    app.use(
        cors({
            origin: config.server.corsOrigin,
            methods: ['GET', 'POST', 'DELETE'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        })
    );

    app.use(express.json({ limit: '1mb' }));

    app.use((req: Request, _res: Response, next: NextFunction) => {
        log.debug('request', { method: req.method, path: req.path });
        next();
    });

    // =========================================================================
    // Query
    // =========================================================================

    /**
     * POST /api/query
     *
     * Answers a question from the indexed documents. Generation failures are
     * reported inside the answer, so this route only fails on bad input.
     */
    app.post('/api/query', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const parsed = queryRequestSchema.safeParse(req.body);
            const validation = validateQuery(parsed.success ? parsed.data.question : undefined);
            if (!parsed.success || !validation.valid) {
                res.status(400).json({
                    error: validation.error ?? 'Query is required',
                    code: 'INVALID_QUERY',
                });
                return;
            }

            res.json(await ragEngine.query(parsed.data.question));
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /api/similar?q=<text>&limit=<n>
     *
     * Nearest stored records without generation.
     */
    app.get('/api/similar', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const query = typeof req.query.q === 'string' ? req.query.q : undefined;
            const validation = validateQuery(query);
            if (query === undefined || !validation.valid) {
                res.status(400).json({
                    error: validation.error ?? 'Query is required',
                    code: 'INVALID_QUERY',
                });
                return;
            }

            const limit = similarLimitSchema.safeParse(req.query.limit);
            if (!limit.success) {
                res.status(400).json({
                    error: `limit must be an integer between 1 and ${MAX_SIMILAR_LIMIT}`,
                    code: 'INVALID_LIMIT',
                });
                return;
            }

            res.json(await ragEngine.findSimilar(query, limit.data));
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Document Management Endpoints
    // =========================================================================

    /**
     * POST /api/documents
     *
     * Upload a PDF or image (multipart field "file") and index it.
     */
    app.post('/api/documents', upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
        try {
            const file = req.file;

            if (!file) {
                res.status(400).json({
                    error: `No supported file uploaded. Supported formats: ${SUPPORTED_EXTENSIONS.join(', ')}`,
                    code: 'MISSING_FILE',
                });
                return;
            }

            const report = await ingestion.ingestFile(file.path);
            res.status(report.failed === 0 ? 201 : 422).json(report);
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /api/documents/url
     *
     * Fetch a web page and index its visible text.
     */
    app.post('/api/documents/url', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const parsed = urlIngestRequestSchema.safeParse(req.body);
            if (!parsed.success) {
                res.status(400).json({
                    error: 'A URL is required',
                    code: 'MISSING_URL',
                });
                return;
            }

            const report = await ingestion.ingestUrl(parsed.data.url);
            res.status(report.failed === 0 ? 201 : 422).json(report);
        } catch (error) {
            next(error);
        }
    });

    /**
     * DELETE /api/documents
     *
     * Remove every record from the index.
     */
    app.delete('/api/documents', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const removed = await ragEngine.clear();
            res.json({ removed });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Stats and Health
    // =========================================================================

    app.get('/api/stats', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(await ragEngine.stats());
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /api/health
     *
     * 200 when embeddings, index and a backend all work, 503 otherwise.
     */
    app.get('/api/health', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const report = await ragEngine.health();
            const response: HealthResponse = {
                status: report.pipelineReady ? 'ok' : 'error',
                ...report,
            };
            res.status(report.pipelineReady ? 200 : 503).json(response);
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /api/backend/reset
     *
     * Route calls to the primary backend again after a failover.
     */
    app.post('/api/backend/reset', (_req: Request, res: Response) => {
        ragEngine.resetBackend();
        res.json({ degraded: context.router.degraded });
    });

    // =========================================================================
    // Error Handling Middleware
    // =========================================================================

    app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof multer.MulterError) {
            res.status(400).json({
                error: err.message,
                code: err.code,
            });
            return;
        }

        log.error('unhandled_error', errorFields(err));

        // Don't leak internal details
        res.status(500).json({
            error: 'Internal server error',
        });
    });

    return app;
}

/**
 * Starts listening and registers the close on the context's dispose.
 */
export function startServer(context: AppContext): Promise<http.Server> {
    const app = createApp(context);
    const { port, host } = context.config.server;

    return new Promise((resolve, reject) => {
        const server = app.listen(port, host, () => {
            log.info('server_listening', { url: `http://${host}:${port}`, health: '/api/health' });
            resolve(server);
        });
        server.on('error', reject);

        context.onDispose(
            () =>
                new Promise<void>((done, fail) => {
                    server.close((error) => (error ? fail(error) : done()));
                })
        );
    });
}
