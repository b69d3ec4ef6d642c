import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const register = new Registry();

let defaultMetricsStarted = false;

/** Process-level metrics (heap, event loop). Started once from the entry point. */
export function initDefaultMetrics(): void {
  if (defaultMetricsStarted) return;
  collectDefaultMetrics({ register, prefix: 'encore_' });
  defaultMetricsStarted = true;
}

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getContentType(): string {
  return register.contentType;
}

// ───── HTTP ─────────────────────────────────────────────────────

export const httpRequestDuration = new Histogram({
  name: 'encore_http_request_duration_seconds',
  help: 'HTTP request duration',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [register],
});

export const webhookDuplicatesTotal = new Counter({
  name: 'encore_webhook_duplicates_total',
  help: 'Inbound webhook deliveries dropped as duplicates',
  registers: [register],
});

// ───── Turn pipeline ────────────────────────────────────────────

export const turnDuration = new Histogram({
  name: 'encore_turn_duration_seconds',
  help: 'End-to-end turn processing time by terminal status',
  labelNames: ['status'] as const,
  buckets: [0.1, 0.5, 1, 2, 5, 10, 20, 40],
  registers: [register],
});

export const turnStageTransitions = new Counter({
  name: 'encore_turn_stage_transitions_total',
  help: 'Turn stage transitions',
  labelNames: ['from', 'to'] as const,
  registers: [register],
});

export const versionConflicts = new Counter({
  name: 'encore_version_conflicts_total',
  help: 'Optimistic commit conflicts',
  labelNames: ['outcome'] as const,
  registers: [register],
});

export const gateVerdicts = new Counter({
  name: 'encore_gate_verdicts_total',
  help: 'Security gate verdicts',
  labelNames: ['allowed', 'reason'] as const,
  registers: [register],
});

export const routingDecisions = new Counter({
  name: 'encore_routing_decisions_total',
  help: 'Router decisions by reason and target agent',
  labelNames: ['reason', 'target'] as const,
  registers: [register],
});

export const escalationsTotal = new Counter({
  name: 'encore_escalations_total',
  help: 'Escalations by trigger',
  labelNames: ['trigger'] as const,
  registers: [register],
});

export const priorityTotalScore = new Histogram({
  name: 'encore_priority_total_score',
  help: 'Aggregate priority score per turn',
  buckets: [1, 2, 3, 4, 5, 6, 7, 8, 9, 10],
  registers: [register],
});

export const pendingEffectsDelivered = new Counter({
  name: 'encore_effects_delivered_total',
  help: 'Committed side effects delivered',
  labelNames: ['kind', 'status'] as const,
  registers: [register],
});

// ───── Collaborators ────────────────────────────────────────────

export const collaboratorCalls = new Counter({
  name: 'encore_collaborator_calls_total',
  help: 'Calls to external collaborators',
  labelNames: ['dependency', 'outcome'] as const,
  registers: [register],
});

export const collaboratorRetries = new Counter({
  name: 'encore_collaborator_retries_total',
  help: 'Collaborator retries by failure class',
  labelNames: ['dependency', 'failure_class'] as const,
  registers: [register],
});

export const circuitTransitions = new Counter({
  name: 'encore_circuit_transitions_total',
  help: 'Collaborator circuit state changes',
  labelNames: ['dependency', 'to'] as const,
  registers: [register],
});

export const llmRequestDuration = new Histogram({
  name: 'encore_llm_request_duration_seconds',
  help: 'LLM request duration by provider',
  labelNames: ['provider', 'model', 'status'] as const,
  buckets: [0.25, 0.5, 1, 2, 5, 10, 20],
  registers: [register],
});

export const llmProviderFailovers = new Counter({
  name: 'encore_llm_provider_failovers_total',
  help: 'Failovers between LLM providers',
  labelNames: ['from_provider', 'to_provider', 'reason'] as const,
  registers: [register],
});

export const llmTokenUsage = new Counter({
  name: 'encore_llm_tokens_total',
  help: 'LLM token usage',
  labelNames: ['provider', 'model', 'token_type'] as const,
  registers: [register],
});

export const toolCallDuration = new Histogram({
  name: 'encore_tool_call_duration_seconds',
  help: 'Agent tool execution time',
  labelNames: ['tool', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [register],
});

export const ticketOperations = new Counter({
  name: 'encore_ticket_operations_total',
  help: 'Ticket store operations',
  labelNames: ['operation', 'status'] as const,
  registers: [register],
});
