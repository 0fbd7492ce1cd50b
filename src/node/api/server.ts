import express, { Express, Request, Response, NextFunction, Router } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import swaggerUi from 'swagger-ui-express';
import type { Server } from 'http';
import type { ExchangeNode } from '../ExchangeNode.js';
import { RequestVerifier } from '../../protocol/security/request-signature.js';
import { logger } from '../../protocol/utils/logger.js';
import { apiKeyAuth } from './middleware/auth.js';
import { createPoolRoutes } from './routes/pool.js';
import { createAdminRoutes } from './routes/admin.js';
import { createVaultRoutes, FaucetSettings } from './routes/vault.js';
import { swaggerSpec } from './swagger.js';

const log = logger.child('API');

export interface ApiSettings {
    version: string;
    rateLimit: {
        windowMs: number;
        maxRequests: number;
    };
    cors: {
        origin: string;
    };
    adminApiKey: string;
    faucet: FaucetSettings;
}

export function createApp(node: ExchangeNode, settings: ApiSettings): Express {
    const app: Express = express();

    const apiLimiter = rateLimit({
        windowMs: settings.rateLimit.windowMs,
        max: settings.rateLimit.maxRequests,
        standardHeaders: true,
        legacyHeaders: false,
        message: {
            success: false,
            error: 'Too many requests, please try again later.',
        },
    });

    // Middleware
    app.set('trust proxy', 1);
    app.use(cors(settings.cors));
    app.use(express.json({ limit: '100kb' }));
    app.use(apiLimiter);

    // Request logging
    app.use((req: Request, _res: Response, next: NextFunction) => {
        log.debug(`${req.method} ${req.path}`);
        next();
    });

    // Health check
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            success: true,
            data: {
                status: 'healthy',
                version: settings.version,
                pools: node.exchange.listPools().length,
                uptime: process.uptime(),
                timestamp: Date.now(),
            },
        });
    });

    // Swagger Documentation
    app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec, {
        customCss: '.swagger-ui .topbar { display: none }',
        customSiteTitle: 'AMM Exchange API Docs',
    }));

    // OpenAPI JSON endpoint
    app.get('/api/docs.json', (_req: Request, res: Response) => {
        res.json(swaggerSpec);
    });

    // ==========================================
    // V1 API Router (versioned)
    // ==========================================
    const v1Router = Router();
    const verifier = new RequestVerifier();

    v1Router.use('/pool', createPoolRoutes(node, verifier));
    v1Router.use('/vault', createVaultRoutes(node, settings.faucet));
    v1Router.use('/admin', apiKeyAuth(settings.adminApiKey), createAdminRoutes(node, verifier));

    app.use('/api/v1', v1Router);

    // 404 handler
    app.use((_req: Request, res: Response) => {
        res.status(404).json({
            success: false,
            error: 'Endpoint not found',
        });
    });

    // Malformed JSON and anything the routes did not catch
    app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof SyntaxError) {
            res.status(400).json({
                success: false,
                error: 'Malformed JSON body',
            });
            return;
        }
        log.error('Unhandled API error:', err);
        res.status(500).json({
            success: false,
            error: 'Internal server error',
        });
    });

    return app;
}

export function startServer(node: ExchangeNode, settings: ApiSettings, port: number): Promise<Server> {
    const app = createApp(node, settings);
    return new Promise((resolve, reject) => {
        const server = app.listen(port, () => {
            log.info(`🚀 API server listening on http://localhost:${port}`);
            resolve(server);
        });
        server.on('error', reject);
    });
}
