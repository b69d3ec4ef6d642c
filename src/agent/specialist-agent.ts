import type { Logger } from 'pino';
import { AutomatedAgentId } from '../config/types';
import { LanguageService } from '../llm/language-service';
import { logger } from '../observability/logger';
import { ToolResultSummary } from '../tools/types';
import { ContractViolation, parseContract, toAgentOutcome } from './response-contract';
import { AgentContext, AgentOutcome, SpecialistAgent } from './types';

/**
 * Specialist agent backed by the language service. Persona and tool
 * guidance come from the agent's prompt; this class only enforces the
 * response contract.
 */
export class LLMSpecialistAgent implements SpecialistAgent {
  private readonly log: Logger;

  constructor(
    readonly id: AutomatedAgentId,
    private readonly language: LanguageService,
  ) {
    this.log = logger.child({ component: 'specialist-agent', agent: id });
  }

  async decide(ctx: AgentContext, signal: AbortSignal): Promise<AgentOutcome> {
    const raw = await this.language.generate({ ...ctx, agent: this.id, phase: 'decide', toolResults: [] }, signal);
    const outcome = toAgentOutcome(parseContract(raw), this.id);
    this.log.debug({ requestId: ctx.requestId, outcome: outcome.kind }, 'Agent decided');
    return outcome;
  }

  async compose(ctx: AgentContext, toolResults: ToolResultSummary[], signal: AbortSignal): Promise<string> {
    const raw = await this.language.generate({ ...ctx, agent: this.id, phase: 'compose', toolResults }, signal);
    const text = parseContract(raw).user_facing_message.trim();
    if (!text) throw new ContractViolation('Agent composed an empty reply');
    return text;
  }
}

export type AgentRoster = Record<AutomatedAgentId, SpecialistAgent>;

export function createAgentRoster(language: LanguageService): AgentRoster {
  return {
    SALES: new LLMSpecialistAgent('SALES', language),
    SUPPORT: new LLMSpecialistAgent('SUPPORT', language),
    ROYALTIES: new LLMSpecialistAgent('ROYALTIES', language),
  };
}
