import type { Request, Response } from 'express';
import type { CircuitsData } from '../../types/api.js';
import type { CircuitBreakerRegistry } from '../../services/circuit-breaker.js';
import { sendOk } from '../shared.js';

export interface CircuitsDeps {
    breaker: Pick<CircuitBreakerRegistry, 'failureThreshold' | 'ttlMs' | 'snapshot'>;
}

/** GET /circuits — Per-agent breaker state. Agents with no recorded failures are omitted. */
export function handleCircuits(deps: CircuitsDeps) {
    return (_req: Request, res: Response): void => {
        const data: CircuitsData = {
            failureThreshold: deps.breaker.failureThreshold,
            ttlMs: deps.breaker.ttlMs,
            circuits: deps.breaker.snapshot(),
        };
        sendOk(res, data);
    };
}
