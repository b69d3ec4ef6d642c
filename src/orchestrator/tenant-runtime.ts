/**
 * Per-tenant policy objects. The gate keeps rate-limit windows, so each
 * tenant's instances live until the config is reloaded.
 */

import { TenantConfig } from '../config/types';
import { ConfigService } from '../config/config-service';
import { SecurityGate } from '../security/security-gate';
import { SafetyClassifier } from '../security/types';
import { HandoffRouter } from '../routing/handoff-router';
import { PriorityEngine } from '../escalation/priority-engine';
import { Delay, FallbackController } from '../resilience/fallback-controller';
import { DependencyHealthManager } from '../resilience/dependency-health';
import { sleep } from '../resilience/timeout';
import { ToolRegistry } from '../tools/registry';
import { ToolRuntime } from '../tools/runtime';
import { AuditService } from '../audit/audit-service';
import { logger } from '../observability/logger';

export interface TenantRuntime {
  config: TenantConfig;
  gate: SecurityGate;
  router: HandoffRouter;
  priority: PriorityEngine;
  fallback: FallbackController;
  tools: ToolRuntime;
}

export interface TenantRuntimeDeps {
  configService: ConfigService;
  classifier: SafetyClassifier;
  registry: ToolRegistry;
  health: DependencyHealthManager;
  audit?: AuditService;
  now?: () => number;
  delay?: Delay;
}

export class TenantRuntimeRegistry {
  private readonly runtimes = new Map<string, TenantRuntime>();

  constructor(private readonly deps: TenantRuntimeDeps) {}

  get(tenantId: string): TenantRuntime {
    const config = this.deps.configService.get(tenantId);
    const cached = this.runtimes.get(config.tenantId);
    if (cached) return cached;

    const runtime = this.build(config);
    this.runtimes.set(config.tenantId, runtime);
    return runtime;
  }

  /** Drop cached policies after a config reload */
  invalidate(): void {
    this.runtimes.clear();
    logger.info('Tenant runtimes invalidated');
  }

  private build(config: TenantConfig): TenantRuntime {
    const { configService, classifier, registry, health, audit } = this.deps;
    const now = this.deps.now ?? Date.now;
    const fallback = new FallbackController(config.retry, health, this.deps.delay ?? sleep);
    return {
      config,
      gate: new SecurityGate(config.gate, classifier, now),
      router: new HandoffRouter(config.routing),
      priority: new PriorityEngine(config.priority),
      fallback,
      tools: new ToolRuntime(
        registry,
        fallback,
        (tenantId, toolName) => configService.isToolEnabled(tenantId, toolName),
        audit,
        now,
      ),
    };
  }
}
