import * as fs from 'fs';
import * as path from 'path';
import { AutomatedAgentId, RoutingPolicy, TenantConfig, isAutomatedAgentId } from './types';
import { logger } from '../observability/logger';
import { DEFAULT_GATE_POLICY } from '../security/security-gate';
import { DEFAULT_PRIORITY_POLICY } from '../escalation/priority-engine';
import { DEFAULT_ROUTING_POLICY } from '../routing/handoff-router';
import { resolveRetryPolicy, RetryPolicy } from '../resilience/retry-policy';
import type { GatePolicy } from '../security/types';
import type { PriorityPolicy } from '../escalation/types';

// Resolve from project root (2 levels up from dist/config/ or src/config/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const CONFIG_DIR = path.resolve(PROJECT_ROOT, 'config', 'tenants');

/** On-disk tenant file: every policy field is optional and overlays the defaults */
export interface TenantConfigFile {
  tenantId: string;
  defaultAgent?: AutomatedAgentId;
  enabledTools?: string[];
  knowledgeTopK?: number;
  gate?: Partial<GatePolicy>;
  routing?: Partial<RoutingPolicy>;
  priority?: Partial<PriorityPolicy>;
  retry?: Partial<RetryPolicy>;
}

export function resolveTenantConfig(file: TenantConfigFile): TenantConfig {
  const priority = file.priority ?? {};
  return {
    tenantId: file.tenantId,
    defaultAgent: isAutomatedAgentId(file.defaultAgent) ? file.defaultAgent : 'SALES',
    enabledTools: file.enabledTools ?? ['*'],
    knowledgeTopK: file.knowledgeTopK ?? 4,
    gate: { ...DEFAULT_GATE_POLICY, ...file.gate },
    routing: { ...DEFAULT_ROUTING_POLICY, ...file.routing },
    priority: {
      ...DEFAULT_PRIORITY_POLICY,
      ...priority,
      weights: { ...DEFAULT_PRIORITY_POLICY.weights, ...priority.weights },
      riskCeilings: { ...DEFAULT_PRIORITY_POLICY.riskCeilings, ...priority.riskCeilings },
      riskKeywords: { ...DEFAULT_PRIORITY_POLICY.riskKeywords, ...priority.riskKeywords },
    },
    retry: resolveRetryPolicy(file.retry),
  };
}

export class ConfigService {
  private configs: Map<string, TenantConfig> = new Map();
  private readonly builtIn = ConfigService.builtInDefault();

  constructor(private readonly configDir: string = CONFIG_DIR) {
    this.loadAll();
  }

  loadAll(): void {
    this.configs.clear();
    if (!fs.existsSync(this.configDir)) {
      logger.warn({ dir: this.configDir }, 'Tenant config directory not found; using built-in default');
      return;
    }

    const files = fs.readdirSync(this.configDir).filter((f) => f.endsWith('.json'));
    for (const file of files) {
      try {
        const raw = fs.readFileSync(path.join(this.configDir, file), 'utf-8');
        const parsed = JSON.parse(raw) as TenantConfigFile;
        if (typeof parsed.tenantId !== 'string' || !parsed.tenantId) {
          logger.error({ file }, 'Tenant config without tenantId skipped');
          continue;
        }
        this.configs.set(parsed.tenantId, resolveTenantConfig(parsed));
        logger.info({ tenantId: parsed.tenantId }, 'Loaded tenant config');
      } catch (err) {
        logger.error({ file, err }, 'Failed to load tenant config');
      }
    }
  }

  /** Tenant config, falling back to the "default" tenant, then to built-in defaults */
  get(tenantId: string): TenantConfig {
    return this.configs.get(tenantId) ?? this.configs.get('default') ?? this.builtIn;
  }

  /** Loaded tenant ids */
  tenantIds(): string[] {
    return [...this.configs.keys()];
  }

  /** Config summary safe for the admin API (no keyword lists) */
  getSummary(tenantId: string): Record<string, unknown> {
    const cfg = this.get(tenantId);
    return {
      tenantId: cfg.tenantId,
      defaultAgent: cfg.defaultAgent,
      enabledTools: cfg.enabledTools,
      knowledgeTopK: cfg.knowledgeTopK,
      routing: cfg.routing,
      escalationThreshold: cfg.priority.escalationThreshold,
      riskCeilings: cfg.priority.riskCeilings,
      rateLimit: { turnsPerWindow: cfg.gate.turnsPerWindow, windowSeconds: cfg.gate.windowSeconds },
      regenerateOnConflict: cfg.retry.regenerateOnConflict,
    };
  }

  isToolEnabled(tenantId: string, toolName: string): boolean {
    const { enabledTools } = this.get(tenantId);
    return enabledTools.includes('*') || enabledTools.includes(toolName);
  }

  static builtInDefault(): TenantConfig {
    return resolveTenantConfig({ tenantId: 'default' });
  }
}
