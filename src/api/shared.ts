import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';
import type { ApiEnvelope, RankErrorBody } from '../types/api.js';
import type { TypedError } from '../types/orchestration.js';
import { AgentError } from '../services/agent-errors.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

// ── Response Helpers ────────────────────────────────────────────────────────

function correlationIdOf(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(res: Response, message: string, status = 400): void {
    const body: ApiEnvelope = {
        ok: false,
        error: scrubSensitiveText(message),
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/**
 * Send a ranking-contract error body: `{ error: { type, message, status } }`.
 * The HTTP status matches the typed status, 500 when it has none.
 */
export function sendWireError(res: Response, error: TypedError): void {
    const body: RankErrorBody = {
        error: { ...error, message: scrubSensitiveText(error.message) },
    };
    res.status(error.status ?? 500).json(body);
}

export function sendInvalidRequest(res: Response, message: string, status = 400): void {
    sendWireError(res, new AgentError('invalid_request', message, status).toWire());
}

// ── Error Mapping ───────────────────────────────────────────────────────────

/** Map a caught error to a status code and message. */
export function mapError(err: unknown): { status: number; message: string } {
    if (err instanceof AgentError) {
        return { status: err.status ?? 500, message: scrubSensitiveText(err.message) };
    }
    if (err instanceof Error) {
        return { status: 500, message: scrubSensitiveText(err.message) };
    }
    return { status: 500, message: scrubSensitiveText(String(err)) };
}

function isBodyParseError(err: unknown): boolean {
    return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Terminal error middleware. Malformed JSON bodies get a ranking-contract
 * `invalid_request`; anything else is logged and returned as an envelope.
 */
export function handleUncaughtError(err: unknown, req: Request, res: Response, _next: NextFunction): void {
    if (isBodyParseError(err)) {
        sendInvalidRequest(res, 'Request body is not valid JSON');
        return;
    }
    const { status, message } = mapError(err);
    void logThought(`[API] [${correlationIdOf(res) ?? 'unknown'}] ${req.method} ${req.path} failed: ${message}`);
    sendError(res, message, status);
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every request, inject a correlation ID and echo it as `X-Request-ID`. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    const startedAt = Date.now();
    res.locals.correlationId = correlationId;
    res.setHeader('X-Request-ID', correlationId);

    const method = req.method;
    const path = req.path;
    void logThought(`[API] [${correlationId}] ${method} ${path}`);
    res.on('finish', () => {
        void logThought(
            `[API] [${correlationId}] ${method} ${path} -> ${res.statusCode} (${Date.now() - startedAt}ms)`,
        );
    });
    next();
}
