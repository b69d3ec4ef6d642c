import { CatalogClient, PlanTier } from '../catalog-client';
import { QueryToolDefinition, ToolHandler } from '../types';

/** Annual billing discount applied on top of the volume discount */
const YEARLY_FACTOR = 0.9;

/** Volume discount by releases per year */
export function volumeDiscount(numReleases: number): number {
  if (numReleases > 20) return 0.15;
  if (numReleases > 10) return 0.1;
  return 0;
}

const round2 = (n: number): number => Math.round(n * 100) / 100;

export function createGenerateQuoteTool(catalog: CatalogClient): QueryToolDefinition {
  const handler: ToolHandler = async (args, _ctx, signal) => {
    const serviceType = String(args.service_type);
    const tier: PlanTier =
      serviceType === 'professional' || serviceType === 'premium' ? serviceType : 'basic';
    const numReleases = Number(args.num_releases);
    const plan = await catalog.getPlan(tier, signal);

    const discount = volumeDiscount(numReleases);
    const monthly = plan.monthly * (1 - discount);

    return {
      success: true,
      data: {
        service: tier,
        artist_name: args.artist_name === undefined ? null : String(args.artist_name),
        num_releases: numReleases,
        monthly_price: round2(monthly),
        yearly_price: round2(monthly * 12 * YEARLY_FACTOR),
        discount_applied: Math.round(discount * 100),
      },
    };
  };

  return {
    kind: 'query',
    name: 'generate_quote',
    version: '1.0.0',
    description: 'Generar una cotización personalizada según plan y número de lanzamientos al año.',
    inputSchema: {
      type: 'object',
      properties: {
        service_type: { type: 'string', enum: ['basic', 'professional', 'premium'] },
        num_releases: { type: 'integer', minimum: 1, description: 'Lanzamientos por año' },
        artist_name: { type: 'string', description: 'Nombre del artista' },
      },
      required: ['service_type', 'num_releases'],
      additionalProperties: false,
    },
    outputSchema: {
      type: 'object',
      properties: {
        service: { type: 'string' },
        monthly_price: { type: 'number' },
        yearly_price: { type: 'number' },
        discount_applied: { type: 'number' },
        num_releases: { type: 'integer' },
      },
      required: ['service', 'monthly_price', 'yearly_price', 'discount_applied', 'num_releases'],
    },
    allowedAgents: ['SALES'],
    allowedChannels: ['whatsapp', 'web'],
    dependency: 'catalog',
    rateLimitPerMinute: 30,
    handler,
  };
}
