export type AgentKind = 'internal' | 'external';

/** Error kinds shared by every agent outcome and the wire contract. */
export type AgentErrorKind =
  | 'invalid_request'
  | 'no_products'
  | 'ai_config_error'
  | 'ai_request_error'
  | 'invalid_response'
  | 'timeout'
  | 'circuit_open'
  | 'internal';

/** One resolved agent to call. Identity is `key` (tenant slug or URL). */
export interface AgentTarget {
  readonly kind: AgentKind;
  readonly key: string;
  readonly endpoint: string;
}

export interface RankedItem {
  product_id: string;
  reason: string;
  score: number | null;
}

/** Wire error body. Internal agents may surface kinds beyond {@link AgentErrorKind} unchanged. */
export interface TypedError {
  type: string;
  message: string;
  status: number | null;
}

/** Terminal state of one agent call. `error` is null on success. */
export interface AgentOutcome {
  target: AgentTarget;
  items: RankedItem[];
  error: TypedError | null;
  durationMs: number;
}

export interface BriefRequest {
  brief: string;
  targets: AgentTarget[];
  timeoutMs: number;
  concurrencyLimit: number;
}

export interface OrchestrationResult {
  contextId: string;
  totalAgents: number;
  timeoutMs: number;
  outcomes: AgentOutcome[];
}

/** Raw agent selectors as submitted by a caller. */
export interface AgentSelectors {
  internalTenantSlugs: string[];
  externalUrls: string[];
}

export interface OrchestrateInput extends AgentSelectors {
  brief: string;
  timeoutMs?: number | null;
  sortByScore?: boolean;
}

export interface ExternalAgentRecord {
  name: string;
  url: string;
}

export type CircuitPhase = 'closed' | 'open' | 'half-open';

export interface CircuitSnapshot {
  key: string;
  state: CircuitPhase;
  consecutiveFailures: number;
  openedAt: string | null;
  remainingCooldownMs: number;
}
