import type { Request, Response } from 'express';
import type { HealthData, ServiceInfoData } from '../../types/api.js';
import { sendOk } from '../shared.js';

export const SERVICE_NAME = 'adcp-orchestrator';

export interface HealthDeps {
    version: string;
}

export interface ServiceInfoDeps {
    adcpVersion: string;
}

/** GET /health — Liveness probe. */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        const data: HealthData = { status: 'ok', service: SERVICE_NAME, version: deps.version };
        sendOk(res, data);
    };
}

/** GET /mcp/ — Advertised protocol version and capabilities. */
export function handleServiceInfo(deps: ServiceInfoDeps) {
    return (_req: Request, res: Response): void => {
        const data: ServiceInfoData = {
            service: SERVICE_NAME,
            adcp_version: deps.adcpVersion,
            capabilities: ['ranking'],
        };
        sendOk(res, data);
    };
}
