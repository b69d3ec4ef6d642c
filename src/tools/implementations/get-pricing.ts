import { CatalogClient, PlanTier } from '../catalog-client';
import { QueryToolDefinition, ToolHandler } from '../types';

const TIERS: readonly PlanTier[] = ['basic', 'professional', 'premium'];

function isPlanTier(value: string): value is PlanTier {
  return (TIERS as readonly string[]).includes(value);
}

export function createGetPricingTool(catalog: CatalogClient): QueryToolDefinition {
  const handler: ToolHandler = async (args, _ctx, signal) => {
    const serviceType = String(args.service_type);

    // Enterprise is always quoted by a person
    if (!isPlanTier(serviceType)) {
      return {
        success: true,
        data: { service: serviceType, custom: true, note: 'Precio a medida; requiere un asesor comercial.' },
      };
    }

    const plan = await catalog.getPlan(serviceType, signal);
    return {
      success: true,
      data: { service: serviceType, monthly: plan.monthly, yearly: plan.yearly, features: plan.features },
    };
  };

  return {
    kind: 'query',
    name: 'get_pricing',
    version: '1.0.0',
    description: 'Consultar precios de los planes de distribución.',
    inputSchema: {
      type: 'object',
      properties: {
        service_type: {
          type: 'string',
          enum: ['basic', 'professional', 'premium', 'enterprise'],
          description: 'Plan a consultar',
        },
      },
      required: ['service_type'],
      additionalProperties: false,
    },
    outputSchema: {
      type: 'object',
      properties: {
        service: { type: 'string' },
        monthly: { type: 'number' },
        yearly: { type: 'number' },
        features: { type: 'array', items: { type: 'string' } },
        custom: { type: 'boolean' },
      },
      required: ['service'],
    },
    allowedAgents: ['SALES'],
    allowedChannels: ['whatsapp', 'web'],
    dependency: 'catalog',
    rateLimitPerMinute: 60,
    handler,
  };
}
