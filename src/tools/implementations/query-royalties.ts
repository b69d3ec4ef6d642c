import { CatalogClient } from '../catalog-client';
import { QueryToolDefinition, ToolHandler } from '../types';

export function createQueryRoyaltiesTool(catalog: CatalogClient): QueryToolDefinition {
  const handler: ToolHandler = async (args, _ctx, signal) => {
    const period = String(args.period);
    const statement = await catalog.getRoyalties(period, signal);
    if (!statement) {
      return { success: false, error: `No hay un reporte de regalías para el período "${period}".` };
    }
    return {
      success: true,
      data: {
        period: statement.period,
        total_earned: statement.totalEarned,
        total_streams: statement.totalStreams,
        payment_status: statement.paymentStatus,
        payment_date: statement.paymentDate,
        breakdown: statement.breakdown,
      },
    };
  };

  return {
    kind: 'query',
    name: 'query_royalties',
    version: '1.0.0',
    description: 'Consultar regalías de un período (YYYY-MM, current_month o last_month).',
    inputSchema: {
      type: 'object',
      properties: {
        period: { type: 'string', pattern: '^(\\d{4}-\\d{2}|current_month|last_month)$' },
      },
      required: ['period'],
      additionalProperties: false,
    },
    outputSchema: {
      type: 'object',
      properties: {
        period: { type: 'string' },
        total_earned: { type: 'number' },
        payment_status: { type: 'string' },
      },
      required: ['period', 'total_earned', 'payment_status'],
    },
    allowedAgents: ['ROYALTIES', 'SUPPORT'],
    allowedChannels: ['whatsapp', 'web'],
    dependency: 'catalog',
    rateLimitPerMinute: 30,
    handler,
  };
}
