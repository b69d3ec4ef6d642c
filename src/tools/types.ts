import { AutomatedAgentId, Channel } from '../config/types';
import { DependencyName } from '../resilience/types';

/** Tool execution context */
export interface ToolContext {
  tenantId: string;
  channel: Channel;
  conversationKey: string;
  callerId: string;
  agent: AutomatedAgentId;
  requestId: string;
}

/** Tool handler function; must honour the abort signal */
export type ToolHandler = (
  args: Record<string, unknown>,
  ctx: ToolContext,
  signal: AbortSignal,
) => Promise<ToolResult>;

/** Tool execution result */
export interface ToolResult {
  success: boolean;
  data?: unknown;
  error?: string;
}

interface ToolMetadata {
  name: string;
  version: string;
  description: string;
  inputSchema: Record<string, unknown>; // JSON Schema
  allowedAgents: AutomatedAgentId[];
  allowedChannels: Channel[];
}

/** Read-only lookup, executed by the tool runtime before commit */
export interface QueryToolDefinition extends ToolMetadata {
  kind: 'query';
  outputSchema: Record<string, unknown>; // JSON Schema
  dependency: DependencyName;
  rateLimitPerMinute: number;
  handler: ToolHandler;
}

/**
 * Tool whose effect the pipeline carries out itself: a ticket written to the
 * outbox, or a handoff to a human. Never executed by the runtime.
 */
export interface IntentToolDefinition extends ToolMetadata {
  kind: 'ticket' | 'handoff';
}

export type ToolDefinition = QueryToolDefinition | IntentToolDefinition;

/** A tool call as requested by an agent */
export interface ToolCallRequest {
  name: string;
  args: Record<string, unknown>;
}

/** What the agent sees about a tool call when composing its reply */
export interface ToolResultSummary {
  name: string;
  args: Record<string, unknown>;
  result: ToolResult;
}

/** Tool call log record */
export interface ToolCallLog {
  tool: string;
  version: string;
  args: Record<string, unknown>;
  result: ToolResult;
  durationMs: number;
  timestamp: number;
  requestId: string;
  conversationKey: string;
  tenantId: string;
}
