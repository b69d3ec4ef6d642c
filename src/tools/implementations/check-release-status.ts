import { CatalogClient } from '../catalog-client';
import { QueryToolDefinition, ToolHandler } from '../types';

export function createCheckReleaseStatusTool(catalog: CatalogClient): QueryToolDefinition {
  const handler: ToolHandler = async (args, _ctx, signal) => {
    const releaseId = String(args.release_id).trim();
    const release = await catalog.findRelease(releaseId, signal);
    if (!release) {
      return { success: false, error: `No encontramos un lanzamiento con el identificador "${releaseId}".` };
    }

    const missingOn = Object.entries(release.platforms)
      .filter(([, status]) => status !== 'active')
      .map(([platform, status]) => ({ platform, status }));

    return {
      success: true,
      data: {
        release_id: release.releaseId,
        title: release.title,
        artist: release.artist,
        status: release.status,
        distribution_date: release.distributionDate,
        platforms: release.platforms,
        not_active_on: missingOn,
        streams_total: release.streamsTotal,
      },
    };
  };

  return {
    kind: 'query',
    name: 'check_release_status',
    version: '1.0.0',
    description: 'Verificar el estado de un lanzamiento en cada plataforma.',
    inputSchema: {
      type: 'object',
      properties: {
        release_id: { type: 'string', minLength: 1, description: 'ID del lanzamiento o título del álbum/single' },
      },
      required: ['release_id'],
      additionalProperties: false,
    },
    outputSchema: {
      type: 'object',
      properties: {
        release_id: { type: 'string' },
        status: { type: 'string' },
        platforms: { type: 'object' },
      },
      required: ['release_id', 'status', 'platforms'],
    },
    allowedAgents: ['SUPPORT', 'ROYALTIES'],
    allowedChannels: ['whatsapp', 'web'],
    dependency: 'catalog',
    rateLimitPerMinute: 60,
    handler,
  };
}
