import { Request, Response, NextFunction, RequestHandler } from 'express';
import { inputValidator } from '../../../protocol/security/input-validator.js';
import { RequestVerifier, SignedAction } from '../../../protocol/security/request-signature.js';
import { logger } from '../../../protocol/utils/logger.js';

/**
 * API Key Authentication Middleware
 * Protects admin routes with the X-API-Key header when a key is configured.
 * Role checks still happen inside the exchange; this only gates the transport.
 */
export function apiKeyAuth(validKey: string): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        if (!validKey) {
            next();
            return;
        }

        const apiKey = req.header('x-api-key');
        if (!apiKey) {
            res.status(401).json({
                success: false,
                error: 'API key required. Add X-API-Key header.',
            });
            return;
        }

        if (apiKey !== validKey) {
            logger.warn(`🔒 Invalid API key attempt from ${req.ip}`);
            res.status(403).json({
                success: false,
                error: 'Invalid API key',
            });
            return;
        }

        next();
    };
}

/**
 * Check that the principal signed this request.
 * Sends 401/400/403 and returns false when it did not.
 */
export async function authenticate(
    res: Response,
    verifier: RequestVerifier,
    body: Record<string, unknown>,
    action: SignedAction,
    principal: string,
    fields: readonly string[]
): Promise<boolean> {
    const credentials = inputValidator.validateCredentials(body);
    if (!credentials.valid) {
        res.status(401).json({
            success: false,
            error: credentials.error,
        });
        return false;
    }

    const check = await verifier.verify({ ...credentials.value, action, principal, fields });
    if (!check.valid) {
        res.status(check.status).json({
            success: false,
            error: check.error,
        });
        return false;
    }
    return true;
}

/**
 * Caller identity for role-gated operations (X-Caller header)
 */
export function callerOf(req: Request): string | undefined {
    const caller = req.header('x-caller');
    return caller && caller.trim().length > 0 ? caller.trim() : undefined;
}
