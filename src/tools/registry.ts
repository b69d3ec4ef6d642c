import { AutomatedAgentId, Channel } from '../config/types';
import { ToolDescriptor } from '../agent/types';
import { logger } from '../observability/logger';
import { CatalogClient } from './catalog-client';
import { ToolDefinition } from './types';

import { createGetPricingTool } from './implementations/get-pricing';
import { createGenerateQuoteTool } from './implementations/generate-quote';
import { createCheckReleaseStatusTool } from './implementations/check-release-status';
import { createQueryRoyaltiesTool } from './implementations/query-royalties';
import { createSupportTicketTool } from './implementations/create-support-ticket';
import { escalateToHumanTool } from './implementations/escalate-to-human';

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      logger.warn({ tool: tool.name }, 'Overwriting existing tool registration');
    }
    this.tools.set(tool.name, tool);
    logger.debug({ tool: tool.name, version: tool.version, kind: tool.kind }, 'Tool registered');
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Tools an agent may request on a channel, given the tenant's allowlist */
  describeFor(agent: AutomatedAgentId, channel: Channel, enabledTools: readonly string[]): ToolDescriptor[] {
    return this.getAll()
      .filter((t) => t.allowedAgents.includes(agent))
      .filter((t) => t.allowedChannels.includes(channel))
      .filter((t) => enabledTools.includes('*') || enabledTools.includes(t.name))
      .map((t) => ({ name: t.name, description: t.description, inputSchema: t.inputSchema }));
  }
}

/** Registry with every built-in tool */
export function createToolRegistry(catalog: CatalogClient): ToolRegistry {
  const registry = new ToolRegistry();

  // ─── Read-only lookups ───
  registry.register(createGetPricingTool(catalog));
  registry.register(createGenerateQuoteTool(catalog));
  registry.register(createCheckReleaseStatusTool(catalog));
  registry.register(createQueryRoyaltiesTool(catalog));

  // ─── Pipeline-handled effects ───
  registry.register(createSupportTicketTool);
  registry.register(escalateToHumanTool);

  logger.info({ count: registry.getAll().length }, 'All built-in tools registered');
  return registry;
}
