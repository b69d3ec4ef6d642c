import { AgentId, AutomatedAgentId, ConversationSnapshot } from '../config/types';
import { KnowledgePassage } from '../knowledge/types';
import { ToolCallRequest, ToolResultSummary } from '../tools/types';

export interface PromptBundle {
  version: string;
  system: string;
  brandTone: string;
  governance: string;
  agents: Record<AutomatedAgentId, string>;
  classifiers: Record<ClassifierName, string>;
}

export type ClassifierName = 'intent' | 'sentiment' | 'implications' | 'domain' | 'malicious';

/** Tool as described to the model */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

/**
 * Result of one agent step. Exactly one variant per step; the pipeline
 * dispatches on `kind`.
 */
export type AgentOutcome =
  | { kind: 'reply'; text: string }
  | { kind: 'reply_with_tool'; text: string; toolRequests: ToolCallRequest[] }
  | { kind: 'handoff'; target: AgentId; text: string; reason: string }
  | { kind: 'escalation'; reason: string; text: string };

export interface AgentContext {
  agent: AutomatedAgentId;
  snapshot: ConversationSnapshot;
  userText: string;
  knowledge: KnowledgePassage[];
  tools: ToolDescriptor[];
  requestId: string;
}

/** Inputs to one generation call */
export interface GenerationRequest extends AgentContext {
  phase: 'decide' | 'compose';
  toolResults: ToolResultSummary[];
}

export interface SpecialistAgent {
  readonly id: AutomatedAgentId;
  /** First pass: reply directly, request tools, hand off or escalate */
  decide(ctx: AgentContext, signal: AbortSignal): Promise<AgentOutcome>;
  /** Second pass: turn tool results into the user-facing reply */
  compose(ctx: AgentContext, toolResults: ToolResultSummary[], signal: AbortSignal): Promise<string>;
}
