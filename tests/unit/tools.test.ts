import { CatalogClient, FileCatalogClient, resolvePeriod } from '../../src/tools/catalog-client';
import { createToolRegistry, ToolRegistry } from '../../src/tools/registry';
import { ToolRuntime } from '../../src/tools/runtime';
import { ToolContext } from '../../src/tools/types';
import { volumeDiscount } from '../../src/tools/implementations/generate-quote';
import { FallbackController } from '../../src/resilience/fallback-controller';
import { DEFAULT_RETRY_POLICY } from '../../src/resilience/retry-policy';
import { AuditService } from '../../src/audit/audit-service';
import { InMemoryAuditStore } from '../../src/audit/audit-store';
import { NOW, noDelay } from '../helpers/fakes';

function ctx(overrides: Partial<ToolContext> = {}): ToolContext {
  return {
    tenantId: 'default',
    channel: 'whatsapp',
    conversationKey: 'whatsapp:5215550000001',
    callerId: '5215550000001',
    agent: 'SALES',
    requestId: 'req-tools',
    ...overrides,
  };
}

describe('ToolRegistry', () => {
  const registry = createToolRegistry(new FileCatalogClient(undefined, () => new Date(NOW)));

  it('should describe only the tools an agent may use on a channel', () => {
    const names = (agent: 'SALES' | 'SUPPORT' | 'ROYALTIES') =>
      registry.describeFor(agent, 'web', ['*']).map((t) => t.name).sort();

    expect(names('SALES')).toEqual(['escalate_to_human', 'generate_quote', 'get_pricing']);
    expect(names('SUPPORT')).toEqual(['check_release_status', 'create_support_ticket', 'escalate_to_human', 'query_royalties']);
    expect(names('ROYALTIES')).toEqual(['check_release_status', 'create_support_ticket', 'escalate_to_human', 'query_royalties']);
  });

  it('should respect the tenant tool allowlist', () => {
    expect(registry.describeFor('SALES', 'web', ['get_pricing']).map((t) => t.name)).toEqual(['get_pricing']);
  });

  it('should classify ticket and handoff tools as orchestrator-handled', () => {
    expect(registry.get('create_support_ticket')?.kind).toBe('ticket');
    expect(registry.get('escalate_to_human')?.kind).toBe('handoff');
    expect(registry.get('get_pricing')?.kind).toBe('query');
  });
});

describe('ToolRuntime', () => {
  let registry: ToolRegistry;
  let audit: AuditService;
  let enabled: Set<string>;
  let runtime: ToolRuntime;

  function build(catalog: CatalogClient): void {
    registry = createToolRegistry(catalog);
    runtime = new ToolRuntime(
      registry,
      new FallbackController(DEFAULT_RETRY_POLICY, undefined, noDelay),
      (_tenantId, toolName) => enabled.has(toolName),
      audit,
      () => NOW,
    );
  }

  beforeEach(() => {
    audit = new AuditService(new InMemoryAuditStore(), () => NOW);
    enabled = new Set(['get_pricing', 'generate_quote', 'check_release_status', 'query_royalties']);
    build(new FileCatalogClient(undefined, () => new Date(NOW)));
  });

  describe('query tools', () => {
    it('should return plan prices', async () => {
      const result = await runtime.execute({ name: 'get_pricing', args: { service_type: 'premium' } }, ctx());

      expect(result).toMatchObject({ success: true, data: { service: 'premium', monthly: 99.99, yearly: 999.99 } });
    });

    it('should route enterprise pricing to a person', async () => {
      const result = await runtime.execute({ name: 'get_pricing', args: { service_type: 'enterprise' } }, ctx());

      expect(result).toEqual({
        success: true,
        data: { service: 'enterprise', custom: true, note: 'Precio a medida; requiere un asesor comercial.' },
      });
    });

    it('should apply volume and yearly discounts to a quote', async () => {
      const result = await runtime.execute(
        { name: 'generate_quote', args: { service_type: 'premium', num_releases: 12, artist_name: 'Marea Norte' } },
        ctx(),
      );

      expect(result).toEqual({
        success: true,
        data: {
          service: 'premium',
          artist_name: 'Marea Norte',
          num_releases: 12,
          monthly_price: 89.99,
          yearly_price: 971.9,
          discount_applied: 10,
        },
      });
    });

    it('should report platforms where a release is not active', async () => {
      const result = await runtime.execute(
        { name: 'check_release_status', args: { release_id: 'REL-1003' } },
        ctx({ agent: 'SUPPORT' }),
      );

      expect(result).toMatchObject({
        success: true,
        data: { release_id: 'REL-1003', status: 'partial', not_active_on: [{ platform: 'spotify', status: 'rejected' }] },
      });
    });

    it('should find a release by title', async () => {
      const result = await runtime.execute(
        { name: 'check_release_status', args: { release_id: 'luna de papel' } },
        ctx({ agent: 'ROYALTIES' }),
      );

      expect(result).toMatchObject({ success: true, data: { release_id: 'REL-1001', not_active_on: [] } });
    });

    it('should explain an unknown release', async () => {
      const result = await runtime.execute(
        { name: 'check_release_status', args: { release_id: 'REL-9999' } },
        ctx({ agent: 'SUPPORT' }),
      );

      expect(result).toEqual({ success: false, error: 'No encontramos un lanzamiento con el identificador "REL-9999".' });
    });

    it('should resolve relative royalty periods against the clock', async () => {
      const result = await runtime.execute(
        { name: 'query_royalties', args: { period: 'last_month' } },
        ctx({ agent: 'ROYALTIES' }),
      );

      expect(result).toMatchObject({
        success: true,
        data: { period: '2026-09', total_earned: 1389.75, payment_status: 'pending' },
      });
    });

    it('should explain a period without a statement', async () => {
      const result = await runtime.execute(
        { name: 'query_royalties', args: { period: 'current_month' } },
        ctx({ agent: 'ROYALTIES' }),
      );

      expect(result).toEqual({ success: false, error: 'No hay un reporte de regalías para el período "current_month".' });
    });
  });

  describe('governance', () => {
    it('should refuse an unknown tool', async () => {
      expect(await runtime.execute({ name: 'delete_account', args: {} }, ctx())).toEqual({
        success: false,
        error: 'Unknown tool: delete_account',
      });
    });

    it('should refuse orchestrator-handled tools', async () => {
      expect(await runtime.execute({ name: 'create_support_ticket', args: {} }, ctx({ agent: 'SUPPORT' }))).toEqual({
        success: false,
        error: 'Tool create_support_ticket is handled by the orchestrator',
      });
    });

    it('should refuse a tool outside the agent allowlist', async () => {
      const result = await runtime.execute({ name: 'check_release_status', args: { release_id: 'REL-1001' } }, ctx());

      expect(result).toEqual({ success: false, error: 'Tool check_release_status is not available to SALES' });
    });

    it('should refuse a tool the tenant disabled', async () => {
      enabled.delete('get_pricing');

      const result = await runtime.execute({ name: 'get_pricing', args: { service_type: 'basic' } }, ctx());

      expect(result).toEqual({ success: false, error: 'The "get_pricing" feature is not currently enabled.' });
    });

    it('should reject arguments that violate the input schema', async () => {
      const result = await runtime.execute(
        { name: 'query_royalties', args: { period: 'septiembre' } },
        ctx({ agent: 'ROYALTIES' }),
      );

      expect(result.success).toBe(false);
      expect(result.error).toMatch(/^Invalid input: \/period must match pattern/);
    });

    it('should coerce numeric strings without touching the caller args', async () => {
      const args = { service_type: 'basic', num_releases: '25' };

      const result = await runtime.execute({ name: 'generate_quote', args }, ctx());

      expect(result).toMatchObject({ success: true, data: { num_releases: 25, discount_applied: 15 } });
      expect(args.num_releases).toBe('25');
    });

    it('should rate limit per tool and tenant', async () => {
      for (let i = 0; i < 30; i++) {
        await runtime.execute({ name: 'query_royalties', args: { period: '2026-08' } }, ctx({ agent: 'ROYALTIES' }));
      }

      const result = await runtime.execute({ name: 'query_royalties', args: { period: '2026-08' } }, ctx({ agent: 'ROYALTIES' }));

      expect(result).toEqual({ success: false, error: 'Tool rate limit exceeded. Try again shortly.' });
    });

    it('should turn an exhausted catalog failure into an unsuccessful result', async () => {
      const getPlan = jest.fn().mockRejectedValue(new Error('catalog offline'));
      build({ getPlan, findRelease: jest.fn(), getRoyalties: jest.fn() });

      const result = await runtime.execute({ name: 'get_pricing', args: { service_type: 'basic' } }, ctx());

      expect(result).toEqual({ success: false, error: 'Tool execution failed' });
      expect(getPlan).toHaveBeenCalledTimes(3);
    });

    it('should record each execution in the audit trail', async () => {
      await runtime.execute({ name: 'get_pricing', args: { service_type: 'basic' } }, ctx());

      const events = await audit.getAuditTrail({ category: 'tool_execution' });
      expect(events).toHaveLength(1);
      expect(events[0].details).toMatchObject({ tool: 'get_pricing', version: '1.0.0', success: true });
    });
  });
});

describe('catalog helpers', () => {
  it('should resolve relative periods across a year boundary', () => {
    expect(resolvePeriod('last_month', new Date(Date.UTC(2027, 0, 10)))).toBe('2026-12');
    expect(resolvePeriod('current_month', new Date(Date.UTC(2027, 0, 10)))).toBe('2027-01');
    expect(resolvePeriod(' 2026-08 ', new Date(NOW))).toBe('2026-08');
  });

  it('should grant volume discounts by release count', () => {
    expect([5, 10, 11, 20, 21].map(volumeDiscount)).toEqual([0, 0, 0.1, 0.1, 0.15]);
  });
});
