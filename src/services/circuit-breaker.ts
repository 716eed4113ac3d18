import type { CircuitPhase, CircuitSnapshot } from '../types/orchestration.js';
import { logThought } from '../utils/logger.js';

const DEFAULT_FAILURE_THRESHOLD = 3;
const DEFAULT_TTL_MS = 60_000;

interface CircuitEntry {
    consecutiveFailures: number;
    openedAt: number | null;
    probeInFlight: boolean;
}

export interface CircuitBreakerOptions {
    failureThreshold?: number;
    ttlMs?: number;
    /** Injectable clock (epoch ms). */
    now?: () => number;
}

/**
 * Per-agent failure gate shared by every orchestration request.
 *
 * Entries are created lazily on the first failure and dropped on success. Every
 * method runs synchronously to completion, so each read-modify-write of an entry
 * is atomic with respect to concurrent requests on the event loop.
 *
 * Once an open breaker's TTL elapses, exactly one probe call is admitted; its
 * outcome either closes the breaker or re-opens it with a fresh window.
 */
export class CircuitBreakerRegistry {
    readonly #failureThreshold: number;
    readonly #ttlMs: number;
    readonly #now: () => number;
    readonly #entries: Map<string, CircuitEntry> = new Map();

    constructor(options: CircuitBreakerOptions = {}) {
        this.#failureThreshold = Math.max(
            1,
            Math.floor(Number(options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD)),
        );
        this.#ttlMs = Math.max(0, Number(options.ttlMs ?? DEFAULT_TTL_MS));
        this.#now = options.now ?? Date.now;
    }

    get failureThreshold(): number {
        return this.#failureThreshold;
    }

    get ttlMs(): number {
        return this.#ttlMs;
    }

    allow(key: string): boolean {
        const entry = this.#entries.get(key);
        if (!entry || entry.openedAt === null) {
            return true;
        }

        if (entry.probeInFlight) {
            return false;
        }

        if (this.#now() - entry.openedAt < this.#ttlMs) {
            return false;
        }

        entry.probeInFlight = true;
        void logThought(`[CircuitBreaker] '${key}' is HALF-OPEN; admitting one probe call.`);
        return true;
    }

    recordSuccess(key: string): void {
        const entry = this.#entries.get(key);
        if (!entry) {
            return;
        }

        this.#entries.delete(key);
        if (entry.openedAt !== null) {
            void logThought(`[CircuitBreaker] '${key}' CLOSED after a successful call.`);
        }
    }

    recordFailure(key: string): void {
        let entry = this.#entries.get(key);
        if (!entry) {
            entry = { consecutiveFailures: 0, openedAt: null, probeInFlight: false };
            this.#entries.set(key, entry);
        }

        entry.consecutiveFailures += 1;

        if (entry.probeInFlight) {
            entry.probeInFlight = false;
            entry.openedAt = this.#now();
            void logThought(`[CircuitBreaker] '${key}' probe failed; re-OPENED for ${this.#ttlMs}ms.`);
            return;
        }

        if (entry.consecutiveFailures >= this.#failureThreshold) {
            if (entry.openedAt === null) {
                void logThought(
                    `[CircuitBreaker] '${key}' OPENED after ${entry.consecutiveFailures} consecutive failure(s).`,
                );
            }
            entry.openedAt = this.#now();
        }
    }

    state(key: string): CircuitPhase {
        const entry = this.#entries.get(key);
        if (!entry || entry.openedAt === null) {
            return 'closed';
        }
        if (entry.probeInFlight || this.#now() - entry.openedAt >= this.#ttlMs) {
            return 'half-open';
        }
        return 'open';
    }

    consecutiveFailures(key: string): number {
        return this.#entries.get(key)?.consecutiveFailures ?? 0;
    }

    snapshot(): CircuitSnapshot[] {
        const now = this.#now();
        return [...this.#entries.entries()]
            .map(([key, entry]) => ({
                key,
                state: this.state(key),
                consecutiveFailures: entry.consecutiveFailures,
                openedAt: entry.openedAt === null ? null : new Date(entry.openedAt).toISOString(),
                remainingCooldownMs: entry.openedAt === null
                    ? 0
                    : Math.max(0, this.#ttlMs - (now - entry.openedAt)),
            }))
            .sort((a, b) => a.key.localeCompare(b.key));
    }
}
