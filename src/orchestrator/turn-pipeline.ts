/**
 * Turn Pipeline
 *
 * One inbound message, start to finish: gate, classification, retrieval,
 * agent execution (tools and handoffs), priority scoring and a single
 * optimistic commit that carries the reply and ticket in the outbox.
 *
 * Agents and the priority engine only ever see the frozen snapshot loaded at
 * the start of an attempt. A version conflict reloads and re-runs the turn
 * from classification; nothing derived from the stale snapshot is reused
 * except, when configured, a tool-free generation for the same agent.
 */

import type { Logger } from 'pino';
import {
  AgentId,
  AutomatedAgentId,
  ConversationSnapshot,
  HandoffReason,
  InboundMessage,
  Message,
  PendingEffect,
  TicketRequest,
  isAutomatedAgentId,
} from '../config/types';
import { ConversationDelta, ConversationSeed, ConversationStore } from '../memory/types';
import { AgentRoster } from '../agent/specialist-agent';
import { AgentContext, AgentOutcome } from '../agent/types';
import { ImplicationReading, PriorityScore, TurnSignals } from '../escalation/types';
import { NEUTRAL_SENTIMENT } from '../escalation/priority-engine';
import { KnowledgePassage, KnowledgeRetriever } from '../knowledge/types';
import { LanguageService } from '../llm/language-service';
import { IntentClassification, RoutingDecision } from '../routing/types';
import { SecurityVerdict } from '../security/types';
import { getRefusal } from '../security/refusals';
import { ToolRegistry } from '../tools/registry';
import { ToolCallRequest, ToolContext, ToolResultSummary } from '../tools/types';
import { allocateTicketRef } from '../ticketing/types';
import { AuditService } from '../audit/audit-service';
import {
  AdmissionRejected,
  ClassificationAmbiguous,
  EscalationRequired,
  TurnCancelled,
  VersionConflict,
  failureClassOf,
  isCollaboratorFailure,
} from '../resilience/errors';
import { getHumanHoldingMessage, getTicketNotice } from '../resilience/static-fallbacks';
import { turnLogger } from '../observability/logger';
import { TraceContext, withSpan } from '../observability/trace';
import { HandoffNote, latestTicketRef, readScratch, writeScratch } from './scratch';
import { TurnStateMachine } from './state-machine';
import { TenantRuntime, TenantRuntimeRegistry } from './tenant-runtime';
import { TurnFailure, TurnInput, TurnOutcome } from './types';

const UNCLEAR_INTENT: IntentClassification = { category: 'UNCLEAR', confidence: 0 };
const NO_IMPLICATIONS: ImplicationReading = { security: 0, financial: 0, legal: 0, operational: 0 };
const CLASSIFIER_HISTORY = 6;
const TICKET_HISTORY = 10;

/** Tools whose service_type argument reveals which plan the caller is weighing */
const PLAN_INTEREST_TOOLS = new Set(['get_pricing', 'generate_quote']);

export interface TurnPipelineDeps {
  store: ConversationStore;
  tenants: TenantRuntimeRegistry;
  language: LanguageService;
  knowledge: KnowledgeRetriever;
  agents: AgentRoster;
  registry: ToolRegistry;
  audit?: AuditService;
  now?: () => number;
  newTicketRef?: () => string;
}

/** Everything one run needs, resolved once per inbound message */
interface RunContext {
  runtime: TenantRuntime;
  message: InboundMessage;
  seed: ConversationSeed;
  trace: TraceContext;
  signal?: AbortSignal;
  log: Logger;
}

interface AgentTicket {
  ticketRef: string;
  issueType?: string;
  description?: string;
}

/** What the agent stage produced for one attempt */
interface AgentExecution {
  /** Agent that produced the reply */
  agent: AgentId;
  routing: RoutingDecision;
  text: string;
  toolCalls: ToolResultSummary[];
  handoffs: HandoffNote[];
  ticket?: AgentTicket;
  escalationReason?: string;
  failure?: TurnFailure;
  planInterest?: string;
}

/** A generation that may be reused when a conflict retry lands on the same agent */
interface ReusableGeneration {
  agent: AgentId;
  text: string;
}

interface TurnPlan {
  delta: ConversationDelta;
  reply?: string;
  ticketRef?: string;
  finalAgent: AgentId;
  priority: PriorityScore;
  routing: RoutingDecision;
  failure?: TurnFailure;
  reusable?: ReusableGeneration;
}

interface Sampled<T> {
  value: T;
  degraded: boolean;
}

function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) throw new TurnCancelled(stage);
}

export class TurnPipeline {
  private readonly now: () => number;
  private readonly newTicketRef: () => string;

  constructor(private readonly deps: TurnPipelineDeps) {
    this.now = deps.now ?? Date.now;
    this.newTicketRef = deps.newTicketRef ?? allocateTicketRef;
  }

  async run(input: TurnInput): Promise<TurnOutcome> {
    const { message, trace, signal } = input;
    const runtime = this.deps.tenants.get(message.tenantId);
    const run: RunContext = {
      runtime,
      message,
      seed: { tenantId: message.tenantId, channel: message.channel, defaultAgent: runtime.config.defaultAgent },
      trace,
      signal,
      log: turnLogger(trace, 'turn-pipeline'),
    };
    const key = message.conversationKey;

    let sm = new TurnStateMachine(key, trace.requestId, 1, 'RECEIVED', this.now);
    let snapshot: ConversationSnapshot | undefined;
    let verdict: SecurityVerdict | undefined;

    try {
      throwIfCancelled(signal, 'load');
      const loaded = await withSpan(trace, 'conversation.load', () =>
        runtime.fallback.call('store', 'load', () => this.deps.store.load(key, run.seed), { signal }),
      ).catch((err: unknown) => {
        // A store outage still passes the gate before it may open a ticket
        if (isCollaboratorFailure(err)) return err;
        throw err;
      });
      const history = isCollaboratorFailure(loaded) ? [] : loaded.messages;
      if (!isCollaboratorFailure(loaded)) snapshot = loaded;

      const admitted = await withSpan(trace, 'security.gate', () =>
        runtime.gate.evaluate({
          conversationKey: key,
          callerId: message.callerId,
          text: message.text,
          recentMessages: history,
          signal,
        }),
      );
      verdict = admitted;
      const rejection = admitted.allowed ? undefined : new AdmissionRejected(admitted);
      await this.deps.audit?.record({
        category: 'security_verdict',
        action: admitted.allowed ? 'admitted' : 'rejected',
        conversationKey: key,
        tenantId: message.tenantId,
        details: admitted.allowed
          ? { confidence: admitted.confidence, checksRun: admitted.checksRun }
          : {
              kind: rejection?.kind,
              reason: admitted.reason,
              failedCheck: admitted.failedCheck,
              detail: admitted.detail,
              classifierFailure: admitted.classifierFailure,
              confidence: admitted.confidence,
            },
      });

      if (!admitted.allowed) {
        sm.advance('REJECTED');
        const reply = getRefusal(admitted.reason);
        return {
          ...this.baseOutcome(run, sm, snapshot, 1),
          status: 'rejected',
          verdict: admitted,
          reply,
          effects: [{ kind: 'send_reply', effectId: `${key}#rejected:${trace.requestId}`, text: reply }],
        };
      }
      sm.advance('ADMITTED');
      if (isCollaboratorFailure(loaded)) {
        return await this.failed(run, sm, undefined, verdict, 1, {
          failureClass: failureClassOf(loaded),
          dependency: loaded.dependency,
          message: loaded.message,
        });
      }

      let current = loaded;
      let reuse: ReusableGeneration | undefined;
      for (let attempt = 1; ; attempt++) {
        const plan = await this.attempt(run, sm, current, reuse);

        throwIfCancelled(signal, 'commit');
        // Past this point the turn is not cancellable
        const expected = current.version;
        const committed = await withSpan(trace, 'conversation.commit', () =>
          runtime.fallback.call(
            'store',
            'commit',
            () => this.deps.store.commit(key, expected, () => plan.delta, run.seed),
            { retry: false },
          ),
        );

        if (committed instanceof VersionConflict) {
          run.log.warn({ attempt, expected, actual: committed.actualVersion }, 'Version conflict on commit');
          await this.deps.audit?.record({
            category: 'error',
            action: committed.kind,
            conversationKey: key,
            tenantId: message.tenantId,
            details: { attempt, expectedVersion: expected, actualVersion: committed.actualVersion },
          });
          if (!(await runtime.fallback.allowConflictRetry(key, attempt, signal))) {
            return await this.failed(run, sm, current, verdict, attempt, {
              failureClass: 'version_conflict',
              dependency: 'store',
              message: committed.message,
            });
          }

          reuse = plan.reusable;
          current = await runtime.fallback.call('store', 'load', () => this.deps.store.load(key, run.seed), { signal });
          snapshot = current;
          sm = new TurnStateMachine(key, trace.requestId, attempt + 1, 'ADMITTED', this.now);
          continue;
        }

        sm.advance('COMMITTED');
        run.log.info(
          {
            version: committed.version,
            agent: committed.currentAgent,
            previousAgent: current.currentAgent,
            total: plan.priority.total,
            escalate: plan.priority.escalate,
            ticketRef: plan.ticketRef,
            attempt,
          },
          'Turn committed',
        );
        return {
          ...this.baseOutcome(run, sm, current, attempt),
          status: 'committed',
          verdict,
          agent: committed.currentAgent,
          reply: plan.reply,
          ticketRef: plan.ticketRef,
          priority: plan.priority,
          routing: plan.routing,
          version: committed.version,
          failure: plan.failure,
          effects: [...committed.pendingEffects],
          conversation: committed,
        };
      }
    } catch (err) {
      if (err instanceof TurnCancelled) {
        if (!sm.terminal) sm.advance('CANCELLED');
        run.log.info({ stage: err.stage }, 'Turn cancelled');
        return {
          ...this.baseOutcome(run, sm, snapshot, sm.attempt),
          status: 'cancelled',
          verdict,
          effects: [],
        };
      }
      if (isCollaboratorFailure(err) && !sm.terminal) {
        // Store unavailable: nothing was committed
        return this.failed(run, sm, snapshot, verdict, sm.attempt, {
          failureClass: failureClassOf(err),
          dependency: err.dependency,
          message: err.message,
        });
      }
      throw err;
    }
  }

  // ───── One attempt: CLASSIFIED → SCORED ─────────────────────────

  private async attempt(
    run: RunContext,
    sm: TurnStateMachine,
    snapshot: ConversationSnapshot,
    reuse?: ReusableGeneration,
  ): Promise<TurnPlan> {
    const { runtime, trace, signal } = run;
    const heldByHuman = snapshot.currentAgent === 'HUMAN';

    // CLASSIFIED
    throwIfCancelled(signal, 'classify');
    const { intent, signals } = heldByHuman
      ? { intent: UNCLEAR_INTENT, signals: { sentiment: NEUTRAL_SENTIMENT, implications: NO_IMPLICATIONS, degraded: false } }
      : await withSpan(trace, 'turn.classify', () => this.classify(run, snapshot));
    const routing = runtime.router.route(snapshot, intent);
    await this.auditRouting(run, routing);
    sm.advance('CLASSIFIED');

    // CONTEXT_RETRIEVED
    throwIfCancelled(signal, 'retrieve');
    const knowledge = heldByHuman ? [] : await withSpan(trace, 'knowledge.retrieve', () => this.retrieve(run));
    sm.advance('CONTEXT_RETRIEVED');

    // AGENT_EXECUTED
    throwIfCancelled(signal, 'agent');
    const execution = heldByHuman
      ? this.holdForHuman(snapshot, routing)
      : await withSpan(trace, 'agent.execute', () => this.execute(run, snapshot, intent, routing, knowledge, reuse));
    sm.advance('AGENT_EXECUTED');

    // SCORED
    throwIfCancelled(signal, 'score');
    const priority = runtime.priority.score(snapshot, run.message.text, signals);
    sm.advance('SCORED');

    return this.plan(run, snapshot, intent, signals, execution, priority);
  }

  private async classify(
    run: RunContext,
    snapshot: ConversationSnapshot,
  ): Promise<{ intent: IntentClassification; signals: TurnSignals }> {
    const { language } = this.deps;
    const text = run.message.text;
    const recent = snapshot.messages.slice(-CLASSIFIER_HISTORY);

    const [intent, sentiment, implications] = await Promise.all([
      this.sample(run, 'classifyIntent', (s) => language.classifyIntent(text, recent, s), UNCLEAR_INTENT),
      this.sample(run, 'classifySentiment', (s) => language.classifySentiment(text, s), NEUTRAL_SENTIMENT),
      this.sample(run, 'classifyImplications', (s) => language.classifyImplications(text, s), NO_IMPLICATIONS),
    ]);

    return {
      intent: intent.value,
      signals: {
        sentiment: sentiment.value,
        implications: implications.value,
        degraded: intent.degraded || sentiment.degraded || implications.degraded,
      },
    };
  }

  /** One classifier observation; exhaustion yields the neutral reading */
  private async sample<T>(
    run: RunContext,
    operation: string,
    fn: (signal: AbortSignal) => Promise<T>,
    neutral: T,
  ): Promise<Sampled<T>> {
    try {
      const value = await run.runtime.fallback.call('llm', operation, fn, { signal: run.signal });
      return { value, degraded: false };
    } catch (err) {
      if (!isCollaboratorFailure(err)) throw err;
      run.log.warn({ operation, err: err.message }, 'Classifier unavailable; using neutral reading');
      return { value: neutral, degraded: true };
    }
  }

  private async retrieve(run: RunContext): Promise<KnowledgePassage[]> {
    const topK = run.runtime.config.knowledgeTopK;
    try {
      return await run.runtime.fallback.call(
        'knowledge',
        'retrieve',
        (s) => this.deps.knowledge.retrieve(run.message.text, topK, s),
        { retry: false, signal: run.signal },
      );
    } catch (err) {
      if (!isCollaboratorFailure(err)) throw err;
      run.log.warn({ err: err.message }, 'Knowledge retrieval failed; continuing without context');
      return [];
    }
  }

  // ───── Agent execution ────────────────────────────────────────

  private holdForHuman(snapshot: ConversationSnapshot, routing: RoutingDecision): AgentExecution {
    const scratch = readScratch(snapshot.state);
    return {
      agent: 'HUMAN',
      routing,
      text: getHumanHoldingMessage(latestTicketRef(scratch)),
      toolCalls: [],
      handoffs: [],
    };
  }

  private async execute(
    run: RunContext,
    snapshot: ConversationSnapshot,
    intent: IntentClassification,
    initial: RoutingDecision,
    knowledge: KnowledgePassage[],
    reuse?: ReusableGeneration,
  ): Promise<AgentExecution> {
    const { runtime, signal } = run;
    let routing = initial;
    let agent: AgentId = initial.target;
    const handoffs: HandoffNote[] = [];
    const turn = readScratch(snapshot.state).turnCount + 1;

    if (reuse && !runtime.fallback.regenerateOnConflict && reuse.agent === agent) {
      run.log.info({ agent }, 'Reusing generation from the conflicted attempt');
      return { agent, routing, text: reuse.text, toolCalls: [], handoffs };
    }

    for (let hop = 0; ; hop++) {
      if (!isAutomatedAgentId(agent)) {
        return { agent, routing, text: '', toolCalls: [], handoffs, escalationReason: 'handoff_to_human' };
      }
      const current: AutomatedAgentId = agent;
      const ctx: AgentContext = {
        agent: current,
        snapshot,
        userText: run.message.text,
        knowledge,
        tools: this.deps.registry.describeFor(current, run.message.channel, runtime.config.enabledTools),
        requestId: run.trace.requestId,
      };

      let outcome: AgentOutcome;
      try {
        outcome = await runtime.fallback.call('llm', 'agent.decide', (s) => this.deps.agents[current].decide(ctx, s), { signal });
      } catch (err) {
        return this.generationFailed(run, err, current, routing, [], handoffs);
      }

      switch (outcome.kind) {
        case 'reply':
          return { agent: current, routing, text: outcome.text, toolCalls: [], handoffs };

        case 'escalation':
          return { agent: current, routing, text: outcome.text, toolCalls: [], handoffs, escalationReason: outcome.reason };

        case 'handoff': {
          if (hop >= runtime.router.maxHandoffHopsPerTurn) {
            run.log.warn({ agent: current, target: outcome.target, hop }, 'Handoff limit reached; escalating');
            return { agent: current, routing, text: outcome.text, toolCalls: [], handoffs, escalationReason: 'handoff_loop' };
          }
          const next = runtime.router.route(snapshot, intent, outcome.target);
          await this.auditRouting(run, next, outcome.reason);
          if (next.target === 'HUMAN') {
            return { agent: current, routing: next, text: outcome.text, toolCalls: [], handoffs, escalationReason: outcome.reason || 'handoff_to_human' };
          }
          handoffs.push({ from: current, to: next.target, reason: outcome.reason, atTurn: turn });
          routing = next;
          agent = next.target;
          continue;
        }

        case 'reply_with_tool': {
          const tools = await this.runTools(run, current, outcome.toolRequests);
          if (tools.escalationReason) {
            return {
              agent: current,
              routing,
              text: outcome.text,
              toolCalls: tools.summaries,
              handoffs,
              ticket: tools.ticket,
              escalationReason: tools.escalationReason,
              planInterest: tools.planInterest,
            };
          }

          let text: string;
          try {
            text = await runtime.fallback.call(
              'llm',
              'agent.compose',
              (s) => this.deps.agents[current].compose(ctx, tools.summaries, s),
              { signal },
            );
          } catch (err) {
            return this.generationFailed(run, err, current, routing, tools.summaries, handoffs, tools.ticket);
          }
          return {
            agent: current,
            routing,
            text,
            toolCalls: tools.summaries,
            handoffs,
            ticket: tools.ticket,
            planInterest: tools.planInterest,
          };
        }
      }
    }
  }

  /**
   * Query tools run now, against the snapshot. Ticket and human-handoff tools
   * only record intent; their effects ride on the commit.
   */
  private async runTools(
    run: RunContext,
    agent: AutomatedAgentId,
    requests: ToolCallRequest[],
  ): Promise<{ summaries: ToolResultSummary[]; ticket?: AgentTicket; escalationReason?: string; planInterest?: string }> {
    const { runtime, message, trace } = run;
    const toolCtx: ToolContext = {
      tenantId: message.tenantId,
      channel: message.channel,
      conversationKey: message.conversationKey,
      callerId: message.callerId,
      agent,
      requestId: trace.requestId,
    };
    let ticket: AgentTicket | undefined;
    let escalationReason: string | undefined;
    let planInterest: string | undefined;

    const summaries = await Promise.all(
      requests.map(async (call): Promise<ToolResultSummary> => {
        const def = this.deps.registry.get(call.name);
        if (def && def.kind !== 'query') {
          const permitted = def.allowedAgents.includes(agent)
            && def.allowedChannels.includes(message.channel)
            && runtime.tools.isToolEnabled(message.tenantId, call.name);
          if (!permitted) {
            return { name: call.name, args: call.args, result: { success: false, error: `Tool ${call.name} is not available` } };
          }
          if (def.kind === 'ticket') {
            ticket = ticket ?? {
              ticketRef: this.newTicketRef(),
              issueType: typeof call.args.issue_type === 'string' ? call.args.issue_type : undefined,
              description: typeof call.args.description === 'string' ? call.args.description : undefined,
            };
            return { name: call.name, args: call.args, result: { success: true, data: { ticket_ref: ticket.ticketRef } } };
          }
          escalationReason = typeof call.args.reason === 'string' && call.args.reason ? call.args.reason : 'agent_request';
          return { name: call.name, args: call.args, result: { success: true, data: { transferred: true } } };
        }

        const result = await withSpan(trace, `tool.${call.name}`, () => runtime.tools.execute(call, toolCtx, run.signal));
        if (result.success && PLAN_INTEREST_TOOLS.has(call.name) && typeof call.args.service_type === 'string') {
          planInterest = call.args.service_type;
        }
        return { name: call.name, args: call.args, result };
      }),
    );

    return { summaries, ticket, escalationReason, planInterest };
  }

  /** Generation exhausted: static reply keyed by agent and failure class, plus escalation */
  private async generationFailed(
    run: RunContext,
    err: unknown,
    agent: AutomatedAgentId,
    routing: RoutingDecision,
    toolCalls: ToolResultSummary[],
    handoffs: HandoffNote[],
    ticket?: AgentTicket,
  ): Promise<AgentExecution> {
    if (!isCollaboratorFailure(err)) throw err;
    const failureClass = failureClassOf(err);
    run.log.error({ agent, failureClass, err: err.message }, 'Generation unavailable; using static reply');
    await this.deps.audit?.record({
      category: 'error',
      action: 'generation_exhausted',
      conversationKey: run.message.conversationKey,
      tenantId: run.message.tenantId,
      details: { agent, failureClass, dependency: err.dependency, operation: err.operation },
    });
    return {
      agent,
      routing,
      text: run.runtime.fallback.staticResponse(agent, failureClass),
      toolCalls,
      handoffs,
      ticket,
      escalationReason: 'generation_unavailable',
      failure: { failureClass, dependency: err.dependency, message: err.message },
    };
  }

  // ───── Plan the commit ────────────────────────────────────────

  private async plan(
    run: RunContext,
    snapshot: ConversationSnapshot,
    intent: IntentClassification,
    signals: TurnSignals,
    execution: AgentExecution,
    priority: PriorityScore,
  ): Promise<TurnPlan> {
    const { message } = run;
    const now = this.now();
    const version = snapshot.version + 1;
    const scratch = readScratch(snapshot.state);
    const alreadyHuman = snapshot.currentAgent === 'HUMAN';
    const escalate = !alreadyHuman && (priority.escalate || execution.escalationReason !== undefined);

    const reasons = [
      ...(execution.escalationReason ? [execution.escalationReason] : []),
      ...(priority.escalate ? priority.reasons : []),
    ];

    let ticketRef = execution.ticket?.ticketRef;
    let ticket: TicketRequest | undefined;
    if (execution.ticket || escalate) {
      ticketRef = ticketRef ?? this.newTicketRef();
      ticket = {
        ticketRef,
        conversationKey: message.conversationKey,
        tenantId: message.tenantId,
        channel: message.channel,
        subject: escalate
          ? `Escalamiento ${execution.agent}: ${reasons[0] ?? 'prioridad alta'}`
          : `Soporte ${execution.agent}: ${execution.ticket?.issueType ?? 'consulta'}`,
        description: execution.ticket?.description ?? message.text,
        reasons,
        priority,
        stateSnapshot: {
          currentAgent: snapshot.currentAgent,
          handlingAgent: execution.agent,
          agentHistory: snapshot.agentHistory,
          recentMessages: snapshot.messages.slice(-TICKET_HISTORY),
          lastUserMessage: message.text,
          toolCalls: execution.toolCalls,
          scratch: snapshot.state,
        },
        requestedAt: now,
      };
    }

    let reply = execution.text.trim();
    if (ticketRef && reply && !reply.includes(ticketRef)) {
      reply = `${reply}\n\n${getTicketNotice(ticketRef, escalate)}`;
    }

    let nextAgent: { agent: AgentId; reason: HandoffReason } | undefined;
    if (escalate) {
      nextAgent = { agent: 'HUMAN', reason: 'escalation' };
    } else if (execution.agent !== snapshot.currentAgent) {
      nextAgent = {
        agent: execution.agent,
        reason: execution.routing.reason === 'explicit_handoff' ? 'explicit_handoff' : 'intent_switch',
      };
    }

    const appendMessages: Message[] = [
      { role: 'user', text: message.text, timestamp: message.timestamp, agentAtTime: execution.agent },
    ];
    if (reply) {
      appendMessages.push({ role: 'agent', text: reply, timestamp: now, agentAtTime: execution.agent });
    }
    if (escalate && ticketRef) {
      appendMessages.push({ role: 'system', text: `Conversación transferida a un especialista (${ticketRef})`, timestamp: now, agentAtTime: 'HUMAN' });
    }

    const effects: PendingEffect[] = [];
    const ticketEffectId = `${message.conversationKey}#${version}:ticket`;
    if (ticket) {
      effects.push({ kind: 'create_ticket', effectId: ticketEffectId, ticket });
    }
    if (reply) {
      effects.push({
        kind: 'send_reply',
        effectId: `${message.conversationKey}#${version}:reply`,
        text: reply,
        ...(ticket ? { dependsOn: ticketEffectId } : {}),
      });
    }

    const handoffNotes = [...scratch.handoffNotes, ...execution.handoffs];
    if (escalate) {
      handoffNotes.push({ from: execution.agent, to: 'HUMAN', reason: reasons[0] ?? 'escalation', atTurn: scratch.turnCount + 1 });
    }
    const state = writeScratch({
      ...scratch,
      turnCount: scratch.turnCount + 1,
      openTicketRefs: ticketRef ? [...scratch.openTicketRefs, ticketRef] : scratch.openTicketRefs,
      detectedPlanInterest: execution.planInterest ?? scratch.detectedPlanInterest,
      lastIntent: alreadyHuman ? scratch.lastIntent : intent,
      lastSignals: signals,
      lastPriority: priority,
      handoffNotes,
      escalatedAt: escalate ? now : scratch.escalatedAt,
    });

    if (escalate) {
      const escalation = new EscalationRequired(reasons);
      run.log.warn({ ticketRef, triggers: priority.triggers, total: priority.total }, escalation.message);
      await this.deps.audit?.record({
        category: 'escalation',
        action: 'escalated_to_human',
        conversationKey: message.conversationKey,
        tenantId: message.tenantId,
        details: {
          kind: escalation.kind,
          ticketRef,
          reasons,
          triggers: priority.triggers,
          subScores: priority.subScores,
          total: priority.total,
          fromAgent: execution.agent,
        },
      });
    }

    const reusable = !execution.failure && execution.toolCalls.length === 0 && execution.handoffs.length === 0
      && !execution.ticket && !execution.escalationReason && execution.agent !== 'HUMAN'
      ? { agent: execution.agent, text: execution.text }
      : undefined;

    return {
      delta: { appendMessages, nextAgent, state, effects },
      reply: reply || undefined,
      ticketRef,
      finalAgent: nextAgent?.agent ?? snapshot.currentAgent,
      priority,
      routing: execution.routing,
      failure: execution.failure,
      reusable,
    };
  }

  // ───── Terminal helpers ───────────────────────────────────────

  /**
   * FAILED: nothing was committed. The caller still gets the static apology
   * and the conversation is escalated through a ticket delivered directly.
   */
  private async failed(
    run: RunContext,
    sm: TurnStateMachine,
    snapshot: ConversationSnapshot | undefined,
    verdict: SecurityVerdict | undefined,
    attempts: number,
    failure: TurnFailure,
  ): Promise<TurnOutcome> {
    const { message, trace } = run;
    const key = message.conversationKey;
    sm.advance('FAILED');

    const agent = snapshot?.currentAgent ?? run.seed.defaultAgent;
    // Text the gate has not admitted never reaches a ticket
    const ticketRef = verdict?.allowed ? this.newTicketRef() : undefined;
    // One apology for every uncommitted failure; the agent-specific texts promise work that never ran
    const apology = run.runtime.fallback.staticResponse(agent, 'version_conflict');
    const reply = ticketRef ? `${apology}\n\n${getTicketNotice(ticketRef, true)}` : apology;
    const reason = failure.failureClass === 'version_conflict' ? 'conflicto de concurrencia no resuelto' : 'almacenamiento no disponible';
    const effects: PendingEffect[] = [];
    if (ticketRef) {
      const ticket: TicketRequest = {
        ticketRef,
        conversationKey: key,
        tenantId: message.tenantId,
        channel: message.channel,
        subject: `Turno fallido: ${reason}`,
        description: message.text,
        reasons: [reason],
        stateSnapshot: {
          currentAgent: agent,
          version: snapshot?.version ?? null,
          recentMessages: snapshot?.messages.slice(-TICKET_HISTORY) ?? [],
          lastUserMessage: message.text,
          failure,
        },
        requestedAt: this.now(),
      };
      effects.push({ kind: 'create_ticket', effectId: `${key}#failed:${trace.requestId}:ticket`, ticket });
    }
    effects.push({ kind: 'send_reply', effectId: `${key}#failed:${trace.requestId}:reply`, text: reply });

    run.log.error({ failure, attempts, ticketRef }, 'Turn failed');
    await this.deps.audit?.record({
      category: 'error',
      action: 'turn_failed',
      conversationKey: key,
      tenantId: message.tenantId,
      details: { ...failure, attempts, ticketRef },
    });

    return {
      ...this.baseOutcome(run, sm, snapshot, attempts),
      status: 'failed',
      verdict,
      reply,
      ticketRef,
      failure,
      effects,
    };
  }

  private baseOutcome(
    run: RunContext,
    sm: TurnStateMachine,
    snapshot: ConversationSnapshot | undefined,
    attempts: number,
  ): Pick<TurnOutcome, 'conversationKey' | 'requestId' | 'stages' | 'agent' | 'previousAgent' | 'attempts' | 'effects'> {
    const agent = snapshot?.currentAgent ?? run.seed.defaultAgent;
    return {
      conversationKey: run.message.conversationKey,
      requestId: run.trace.requestId,
      stages: sm.stages,
      agent,
      previousAgent: agent,
      attempts,
      effects: [],
    };
  }

  private async auditRouting(run: RunContext, decision: RoutingDecision, handoffReason?: string): Promise<void> {
    // A low-confidence intent for another agent is recorded, never raised
    const ambiguity = decision.reason === 'ambiguous' && decision.intent.category !== decision.previous
      ? new ClassificationAmbiguous(decision.intent.category, decision.intent.confidence)
      : undefined;
    await this.deps.audit?.record({
      category: 'routing',
      action: decision.switched ? 'agent_switched' : 'agent_retained',
      conversationKey: run.message.conversationKey,
      tenantId: run.message.tenantId,
      details: {
        from: decision.previous,
        to: decision.target,
        reason: decision.reason,
        intent: decision.intent.category,
        confidence: decision.intent.confidence,
        ...(handoffReason ? { handoffReason } : {}),
        ...(ambiguity ? { kind: ambiguity.kind, detail: ambiguity.message } : {}),
      },
    });
  }
}
