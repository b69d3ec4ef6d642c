import Ajv, { ValidateFunction } from 'ajv';
import { ToolRegistry } from './registry';
import { ToolCallLog, ToolCallRequest, ToolContext, ToolResult } from './types';
import { logger } from '../observability/logger';
import { toolCallDuration } from '../observability/metrics';
import { redactObject } from '../observability/pii-redactor';
import { FallbackController } from '../resilience/fallback-controller';
import { isCollaboratorFailure } from '../resilience/errors';
import { AuditService } from '../audit/audit-service';

const ajv = new Ajv({ allErrors: true, coerceTypes: true });

const RATE_WINDOW_MS = 60_000;

/**
 * Executes read-only tools on behalf of an agent. Every call goes through
 * the fallback controller, so tools share the retry policy and timeouts of
 * every other collaborator. Failures come back as unsuccessful results for
 * the agent to explain; only cancellation propagates.
 */
export class ToolRuntime {
  private readonly rateCounters = new Map<string, { count: number; resetAt: number }>();
  private readonly validators = new Map<string, ValidateFunction>();

  constructor(
    private readonly registry: ToolRegistry,
    private readonly fallback: FallbackController,
    private readonly isEnabled: (tenantId: string, toolName: string) => boolean,
    private readonly audit?: AuditService,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Execute a tool call with full governance:
   * - Registry lookup and kind check
   * - Agent, tenant and channel allowlists
   * - Rate limiting
   * - Schema validation
   * - Timeout and retries via the fallback controller
   * - Output schema validation (logged, not enforced)
   */
  async execute(call: ToolCallRequest, ctx: ToolContext, signal?: AbortSignal): Promise<ToolResult> {
    const startTime = this.now();
    const log = logger.child({
      tool: call.name,
      requestId: ctx.requestId,
      conversationKey: ctx.conversationKey,
      tenantId: ctx.tenantId,
    });

    // 1. Check tool exists and is executable here
    const tool = this.registry.get(call.name);
    if (!tool) {
      log.warn('Tool not found in registry');
      return { success: false, error: `Unknown tool: ${call.name}` };
    }
    if (tool.kind !== 'query') {
      return { success: false, error: `Tool ${call.name} is handled by the orchestrator` };
    }

    // 2. Allowlists
    if (!tool.allowedAgents.includes(ctx.agent)) {
      log.warn({ agent: ctx.agent }, 'Tool not allowed for agent');
      return { success: false, error: `Tool ${call.name} is not available to ${ctx.agent}` };
    }
    if (!this.isEnabled(ctx.tenantId, call.name)) {
      log.warn('Tool not enabled for tenant');
      return { success: false, error: `The "${call.name}" feature is not currently enabled.` };
    }
    if (!tool.allowedChannels.includes(ctx.channel)) {
      log.warn({ channel: ctx.channel, allowed: tool.allowedChannels }, 'Channel not in tool allowedChannels');
      return { success: false, error: 'Tool not supported on this channel' };
    }

    // 3. Rate limit check
    const rateKey = `${call.name}:${ctx.tenantId}`;
    let counter = this.rateCounters.get(rateKey);
    if (!counter || startTime >= counter.resetAt) {
      counter = { count: 0, resetAt: startTime + RATE_WINDOW_MS };
      this.rateCounters.set(rateKey, counter);
    }
    counter.count++;
    if (counter.count > tool.rateLimitPerMinute) {
      log.warn({ count: counter.count, limit: tool.rateLimitPerMinute }, 'Tool rate limit exceeded');
      return { success: false, error: 'Tool rate limit exceeded. Try again shortly.' };
    }

    // 4. Schema validation on a copy; coercion rewrites values in place
    const args = { ...call.args };
    const validate = this.compile(`${tool.name}@${tool.version}:in`, tool.inputSchema);
    if (!validate(args)) {
      const errors = validate.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
      log.warn({ errors }, 'Tool input schema validation failed');
      return { success: false, error: `Invalid input: ${errors}` };
    }

    // 5. Execute
    let result: ToolResult;
    try {
      result = await this.fallback.call(
        tool.dependency,
        `tool.${tool.name}`,
        (s) => tool.handler(args, ctx, s),
        { signal },
      );
    } catch (err) {
      // Cancellation and programming errors propagate
      if (!isCollaboratorFailure(err)) throw err;
      log.error({ err: err.message }, 'Tool execution failed');
      result = { success: false, error: err.kind === 'collaborator_timeout' ? 'Tool execution timed out' : 'Tool execution failed' };
    }

    // 6. Output schema validation
    if (result.success && result.data !== undefined) {
      const outputValidate = this.compile(`${tool.name}@${tool.version}:out`, tool.outputSchema);
      if (!outputValidate(result.data)) {
        const errors = outputValidate.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
        log.warn({ errors }, 'Tool output schema validation failed');
      }
    }

    // 7. Log and return
    const durationMs = this.now() - startTime;
    toolCallDuration.observe({ tool: call.name, status: result.success ? 'success' : 'error' }, durationMs / 1000);
    await this.logToolCall(tool.name, tool.version, args, result, durationMs, ctx);

    return result;
  }

  isToolEnabled(tenantId: string, toolName: string): boolean {
    return this.isEnabled(tenantId, toolName);
  }

  private compile(key: string, schema: Record<string, unknown>): ValidateFunction {
    let validate = this.validators.get(key);
    if (!validate) {
      validate = ajv.compile(schema);
      this.validators.set(key, validate);
    }
    return validate;
  }

  private async logToolCall(
    tool: string,
    version: string,
    args: Record<string, unknown>,
    result: ToolResult,
    durationMs: number,
    ctx: ToolContext,
  ): Promise<void> {
    const logEntry: ToolCallLog = {
      tool,
      version,
      args: redactObject(args),
      result: {
        success: result.success,
        error: result.error,
        // Don't log full data payload to avoid PII in logs
        data: result.success ? '[redacted]' : undefined,
      },
      durationMs,
      timestamp: this.now(),
      requestId: ctx.requestId,
      conversationKey: ctx.conversationKey,
      tenantId: ctx.tenantId,
    };

    logger.info({ toolCallLog: logEntry }, 'Tool call completed');

    await this.audit?.record({
      category: 'tool_execution',
      action: 'tool_executed',
      conversationKey: ctx.conversationKey,
      tenantId: ctx.tenantId,
      details: { tool, version, success: result.success, durationMs, error: result.error },
    });
  }
}
