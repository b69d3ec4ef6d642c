import * as path from 'path';
import { ConfigService, resolveTenantConfig } from '../../src/config/config-service';
import { DEFAULT_PRIORITY_POLICY } from '../../src/escalation/priority-engine';
import { DEFAULT_RETRY_POLICY } from '../../src/resilience/retry-policy';

const FIXTURES = path.resolve(__dirname, '..', 'fixtures', 'tenants');

describe('resolveTenantConfig', () => {
  it('should fill every policy from the defaults', () => {
    const config = resolveTenantConfig({ tenantId: 'minimal' });

    expect(config.defaultAgent).toBe('SALES');
    expect(config.enabledTools).toEqual(['*']);
    expect(config.knowledgeTopK).toBe(4);
    expect(config.routing).toEqual({ switchThreshold: 0.7, maxHandoffHopsPerTurn: 2 });
    expect(config.priority).toEqual(DEFAULT_PRIORITY_POLICY);
    expect(config.retry).toEqual(DEFAULT_RETRY_POLICY);
  });

  it('should merge nested priority overrides field by field', () => {
    const config = resolveTenantConfig({
      tenantId: 'acme',
      priority: { weights: { ...DEFAULT_PRIORITY_POLICY.weights, legal: 0.5 }, riskCeilings: { ...DEFAULT_PRIORITY_POLICY.riskCeilings, legal: 6 } },
    });

    expect(config.priority.weights.legal).toBe(0.5);
    expect(config.priority.weights.sentiment).toBe(0.3);
    expect(config.priority.riskCeilings).toEqual({ security: 8, financial: 8, legal: 6, operational: 8 });
  });
});

describe('ConfigService', () => {
  let configService: ConfigService;

  beforeEach(() => {
    configService = new ConfigService(FIXTURES);
  });

  it('should load only files that name a tenant and parse', () => {
    expect(configService.tenantIds()).toEqual(['sello-norte']);
  });

  it('should overlay a tenant file onto the defaults', () => {
    const config = configService.get('sello-norte');

    expect(config.defaultAgent).toBe('SUPPORT');
    expect(config.knowledgeTopK).toBe(2);
    expect(config.gate.turnsPerWindow).toBe(3);
    expect(config.gate.windowSeconds).toBe(60);
    expect(config.priority.escalationThreshold).toBe(6);
    expect(config.priority.weights).toEqual({ sentiment: 0.3, security: 0.2, financial: 0.15, legal: 0.4, operational: 0.15 });
    expect(config.priority.riskCeilings.financial).toBe(7);
    expect(config.retry.regenerateOnConflict).toBe(false);
    expect(config.retry.timeoutsMs.llm).toBe(8000);
    expect(config.retry.timeoutsMs.store).toBe(2000);
  });

  it('should fall back to the built-in default for unknown tenants', () => {
    expect(configService.get('otro-sello')).toEqual(ConfigService.builtInDefault());
  });

  it('should honor the tenant tool allowlist', () => {
    expect(configService.isToolEnabled('sello-norte', 'check_release_status')).toBe(true);
    expect(configService.isToolEnabled('sello-norte', 'get_pricing')).toBe(false);
    expect(configService.isToolEnabled('otro-sello', 'get_pricing')).toBe(true);
  });

  it('should summarize a tenant without its keyword lists', () => {
    expect(configService.getSummary('sello-norte')).toEqual({
      tenantId: 'sello-norte',
      defaultAgent: 'SUPPORT',
      enabledTools: ['check_release_status'],
      knowledgeTopK: 2,
      routing: { switchThreshold: 0.7, maxHandoffHopsPerTurn: 2 },
      escalationThreshold: 6,
      riskCeilings: { security: 8, financial: 7, legal: 8, operational: 8 },
      rateLimit: { turnsPerWindow: 3, windowSeconds: 60 },
      regenerateOnConflict: false,
    });
  });

  it('should load the shipped default tenant', () => {
    const shipped = new ConfigService();

    expect(shipped.get('default').gate.offTopicKeywords).toContain('invertir');
    expect(shipped.isToolEnabled('default', 'query_royalties')).toBe(true);
  });
});
