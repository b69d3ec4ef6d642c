import { AgentId, AutomatedAgentId, Channel, InboundMessage, TenantConfig, TicketRequest } from '../../src/config/types';
import { ConfigService } from '../../src/config/config-service';
import { AgentContext, AgentOutcome, GenerationRequest, SpecialistAgent } from '../../src/agent/types';
import { ImplicationReading, SentimentReading } from '../../src/escalation/types';
import { KnowledgePassage, KnowledgeRetriever } from '../../src/knowledge/types';
import { LanguageService } from '../../src/llm/language-service';
import { InMemoryConversationStore } from '../../src/memory/conversation-store';
import { ConversationMutator, ConversationSeed, ConversationStore } from '../../src/memory/types';
import { IntentClassification } from '../../src/routing/types';
import { DomainReading, MaliciousReading } from '../../src/security/types';
import { ToolCallRequest, ToolResultSummary } from '../../src/tools/types';
import { FileCatalogClient } from '../../src/tools/catalog-client';
import { createToolRegistry, ToolRegistry } from '../../src/tools/registry';
import { ChannelOutbound } from '../../src/channels/types';
import { InMemoryAuditStore } from '../../src/audit/audit-store';
import { AuditService } from '../../src/audit/audit-service';
import { DependencyHealthManager } from '../../src/resilience/dependency-health';
import { FallbackController } from '../../src/resilience/fallback-controller';
import { MockTicketingService } from '../../src/ticketing/mock-ticketing';
import { TicketRecord } from '../../src/ticketing/types';
import { createTraceContext } from '../../src/observability/trace';
import { TenantRuntimeRegistry } from '../../src/orchestrator/tenant-runtime';
import { TurnPipeline } from '../../src/orchestrator/turn-pipeline';
import { EffectDispatcher } from '../../src/orchestrator/effect-dispatcher';
import { Orchestrator } from '../../src/orchestrator/orchestrator';
import { createDedupStore } from '../../src/security/dedup-store';
import { TurnOutcome } from '../../src/orchestrator/types';

export const NOW = Date.UTC(2026, 9, 19, 12, 0, 0);

export const noDelay = async (): Promise<void> => undefined;

// ───── Agent contract ───────────────────────────────────────────

export function contract(parts: {
  message?: string;
  tools?: ToolCallRequest[];
  handoff?: AgentId | null;
  escalation?: string | null;
}): string {
  return JSON.stringify({
    user_facing_message: parts.message ?? '',
    tool_calls: parts.tools ?? [],
    handoff_to: parts.handoff ?? null,
    escalation_reason: parts.escalation ?? null,
  });
}

/** Ticket reference a ticket tool handed back to the agent */
export function ticketRefFrom(results: readonly ToolResultSummary[]): string | undefined {
  for (const r of results) {
    const data = r.result.data;
    if (typeof data === 'object' && data !== null && 'ticket_ref' in data && typeof data.ticket_ref === 'string') {
      return data.ticket_ref;
    }
  }
  return undefined;
}

// ───── Language service ─────────────────────────────────────────

export type LanguageCall = 'intent' | 'sentiment' | 'implications' | 'domain' | 'malicious' | 'generate';

/** Scripted classifiers and generator; any call listed in `failing` rejects */
export class FakeLanguageService implements LanguageService {
  intent: IntentClassification = { category: 'UNCLEAR', confidence: 0 };
  sentiment: SentimentReading = { score: 0, urgency: 'low', frustration: 0 };
  implications: ImplicationReading = { security: 0, financial: 0, legal: 0, operational: 0 };
  domain: DomainReading = { inDomain: true, confidence: 0.9 };
  malicious: MaliciousReading = { malicious: false, confidence: 0.95 };
  generator: (request: GenerationRequest) => string = () => contract({ message: 'Con gusto te ayudo.' });

  readonly failing = new Set<LanguageCall>();
  readonly calls: Record<LanguageCall, number> = {
    intent: 0,
    sentiment: 0,
    implications: 0,
    domain: 0,
    malicious: 0,
    generate: 0,
  };
  readonly generations: GenerationRequest[] = [];

  async classifyIntent(): Promise<IntentClassification> {
    return this.answer('intent', this.intent);
  }

  async classifySentiment(): Promise<SentimentReading> {
    return this.answer('sentiment', this.sentiment);
  }

  async classifyImplications(): Promise<ImplicationReading> {
    return this.answer('implications', this.implications);
  }

  async classifyDomain(): Promise<DomainReading> {
    return this.answer('domain', this.domain);
  }

  async classifyMaliciousIntent(): Promise<MaliciousReading> {
    return this.answer('malicious', this.malicious);
  }

  async generate(request: GenerationRequest): Promise<string> {
    this.generations.push(request);
    return this.answer('generate', this.generator(request));
  }

  private answer<T>(call: LanguageCall, value: T): T {
    this.calls[call]++;
    if (this.failing.has(call)) throw new Error(`${call} provider unavailable`);
    return value;
  }
}

// ───── Agents ───────────────────────────────────────────────────

/** Agent whose decisions come from test-supplied functions; thrown errors reject */
export class ScriptedAgent implements SpecialistAgent {
  readonly decisions: AgentContext[] = [];
  readonly compositions: ToolResultSummary[][] = [];
  decideWith: (ctx: AgentContext) => AgentOutcome;
  composeWith: (ctx: AgentContext, results: ToolResultSummary[]) => string = () => 'Listo, ya lo revisé.';

  constructor(readonly id: AutomatedAgentId) {
    this.decideWith = () => ({ kind: 'reply', text: `Respuesta de ${id}` });
  }

  async decide(ctx: AgentContext): Promise<AgentOutcome> {
    this.decisions.push(ctx);
    return this.decideWith(ctx);
  }

  async compose(ctx: AgentContext, toolResults: ToolResultSummary[]): Promise<string> {
    this.compositions.push(toolResults);
    return this.composeWith(ctx, toolResults);
  }
}

export type ScriptedRoster = Record<AutomatedAgentId, ScriptedAgent>;

export function createScriptedRoster(): ScriptedRoster {
  return {
    SALES: new ScriptedAgent('SALES'),
    SUPPORT: new ScriptedAgent('SUPPORT'),
    ROYALTIES: new ScriptedAgent('ROYALTIES'),
  };
}

// ───── Collaborators ────────────────────────────────────────────

export class StubKnowledge implements KnowledgeRetriever {
  passages: KnowledgePassage[] = [
    {
      type: 'faq',
      content: 'P: ¿Cuánto tarda un lanzamiento en aparecer?\nR: Entre 2 y 5 días hábiles.',
      relevance: 1,
      source: 'faq/distribucion/tiempos',
    },
  ];
  fail = false;
  readonly queries: Array<{ query: string; topK: number }> = [];

  async retrieve(query: string, topK: number): Promise<KnowledgePassage[]> {
    this.queries.push({ query, topK });
    if (this.fail) throw new Error('knowledge index unavailable');
    return this.passages.slice(0, topK);
  }
}

export interface SentMessage {
  conversationKey: string;
  text: string;
  channel: Channel;
}

/** Outbound channel that records deliveries and can be told to fail */
export class RecordingOutbound implements ChannelOutbound {
  readonly sent: SentMessage[] = [];
  failing = false;
  attempts = 0;
  /** Sends wait on this while it is set */
  hold?: Promise<void>;

  constructor(private readonly events?: string[]) {}

  async sendMessage(conversationKey: string, text: string, channel: Channel): Promise<void> {
    this.attempts++;
    if (this.hold) await this.hold;
    if (this.failing) throw new Error('channel unavailable');
    this.sent.push({ conversationKey, text, channel });
    this.events?.push(`reply:${text}`);
  }
}

/** Ticketing mock that also records creation order into a shared log */
export class RecordingTicketing extends MockTicketingService {
  failing = false;

  constructor(private readonly events: string[]) {
    super(() => NOW);
  }

  override async createTicket(request: TicketRequest): Promise<TicketRecord> {
    if (this.failing) throw new Error('help desk unavailable');
    const record = await super.createTicket(request);
    this.events.push(`ticket:${record.ticketRef}`);
    return record;
  }
}

/**
 * Store where another writer commits just before each of the next
 * `interleaves` commits, so those commits lose the version race.
 */
export class InterleavingStore implements ConversationStore {
  interleaves = 0;

  constructor(readonly inner: InMemoryConversationStore = new InMemoryConversationStore(() => NOW)) {}

  load(key: string, seed: ConversationSeed) {
    return this.inner.load(key, seed);
  }

  peek(key: string) {
    return this.inner.peek(key);
  }

  async commit(key: string, expectedVersion: number, mutator: ConversationMutator, seed: ConversationSeed) {
    if (this.interleaves > 0) {
      this.interleaves--;
      const current = await this.inner.load(key, seed);
      await this.inner.commit(
        key,
        current.version,
        () => ({
          appendMessages: [{ role: 'system', text: 'Nota de otro proceso', timestamp: NOW, agentAtTime: current.currentAgent }],
        }),
        seed,
      );
    }
    return this.inner.commit(key, expectedVersion, mutator, seed);
  }

  acknowledgeEffects(key: string, effectIds: readonly string[]) {
    return this.inner.acknowledgeEffects(key, effectIds);
  }

  listPendingKeys(limit?: number) {
    return this.inner.listPendingKeys(limit);
  }
}

/** Tenant configs from config/tenants, rewritten by `override` */
export class OverriddenConfigService extends ConfigService {
  constructor(private readonly override: (config: TenantConfig) => TenantConfig) {
    super();
  }

  override get(tenantId: string): TenantConfig {
    return this.override(super.get(tenantId));
  }
}

// ───── Harnesses ────────────────────────────────────────────────

export function makeMessage(text: string, overrides: Partial<InboundMessage> = {}): InboundMessage {
  return {
    channel: 'web',
    conversationKey: 'web:session-1',
    callerId: 'session-1',
    text,
    timestamp: NOW,
    tenantId: 'default',
    ...overrides,
  };
}

export interface HarnessOptions {
  store?: ConversationStore;
  configService?: ConfigService;
}

export interface PipelineHarness {
  pipeline: TurnPipeline;
  store: ConversationStore;
  language: FakeLanguageService;
  agents: ScriptedRoster;
  knowledge: StubKnowledge;
  registry: ToolRegistry;
  audit: AuditService;
  health: DependencyHealthManager;
  tenants: TenantRuntimeRegistry;
  configService: ConfigService;
  /** Run one turn with request ids req-1, req-2, ... */
  run(text: string, overrides?: Partial<InboundMessage>, signal?: AbortSignal): Promise<TurnOutcome>;
  nextRequestId(): string;
}

export function createPipelineHarness(options: HarnessOptions = {}): PipelineHarness {
  const store = options.store ?? new InMemoryConversationStore(() => NOW);
  const configService = options.configService ?? new ConfigService();
  const language = new FakeLanguageService();
  const agents = createScriptedRoster();
  const knowledge = new StubKnowledge();
  const registry = createToolRegistry(new FileCatalogClient(undefined, () => new Date(NOW)));
  const audit = new AuditService(new InMemoryAuditStore(), () => NOW);
  const health = new DependencyHealthManager(5, 30_000, () => NOW);
  const tenants = new TenantRuntimeRegistry({
    configService,
    classifier: language,
    registry,
    health,
    audit,
    now: () => NOW,
    delay: noDelay,
  });

  let tickets = 0;
  const pipeline = new TurnPipeline({
    store,
    tenants,
    language,
    knowledge,
    agents,
    registry,
    audit,
    now: () => NOW,
    newTicketRef: () => `TKT-TEST${String(++tickets).padStart(4, '0')}`,
  });

  let requests = 0;
  const nextRequestId = (): string => `req-${++requests}`;

  return {
    pipeline,
    store,
    language,
    agents,
    knowledge,
    registry,
    audit,
    health,
    tenants,
    configService,
    nextRequestId,
    run: (text, overrides, signal) =>
      pipeline.run({
        message: makeMessage(text, overrides),
        trace: createTraceContext({ requestId: nextRequestId() }),
        signal,
      }),
  };
}

export interface OrchestratorHarness extends PipelineHarness {
  orchestrator: Orchestrator;
  outbound: RecordingOutbound;
  ticketing: RecordingTicketing;
  /** Tickets and replies in delivery order */
  events: string[];
  handle(text: string, overrides?: Partial<InboundMessage>): Promise<TurnOutcome | null>;
}

export function createOrchestratorHarness(options: HarnessOptions = {}): OrchestratorHarness {
  const harness = createPipelineHarness(options);
  const events: string[] = [];
  const outbound = new RecordingOutbound(events);
  const ticketing = new RecordingTicketing(events);
  const dispatcher = new EffectDispatcher(
    harness.store,
    ticketing,
    outbound,
    new FallbackController(harness.configService.get('default').retry, harness.health, noDelay),
    harness.audit,
    createDedupStore(undefined, () => NOW),
  );
  const orchestrator = new Orchestrator({
    pipeline: harness.pipeline,
    dispatcher,
    store: harness.store,
    tenants: harness.tenants,
    audit: harness.audit,
    now: () => NOW,
  });

  return {
    ...harness,
    orchestrator,
    outbound,
    ticketing,
    events,
    handle: (text, overrides) =>
      orchestrator.handleInbound(makeMessage(text, overrides), createTraceContext({ requestId: harness.nextRequestId() })),
  };
}

/** Narrow a nullable test value, failing the test when it is missing */
export function must<T>(value: T | null | undefined, what = 'value'): T {
  if (value === null || value === undefined) throw new Error(`Expected ${what} to be present`);
  return value;
}
