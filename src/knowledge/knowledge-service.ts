import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import { FAQEntry, GuideEntry, KnowledgePassage, KnowledgeRetriever, PassageType } from './types';
import { logger } from '../observability/logger';
import { EmbeddingProvider } from './embedding-service';
import { VectorStore, VectorEntry } from './vector-store';
import { normalizeText } from '../security/patterns';

// Resolve from project root (2 levels up from dist/knowledge/ or src/knowledge/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const KNOWLEDGE_DIR = path.resolve(PROJECT_ROOT, 'knowledge');

const MIN_KEYWORD_SCORE = 0.3;
const MIN_VECTOR_SCORE = 0.6;
const RRF_K = 60;

interface IndexedDocument {
  id: string;
  type: PassageType;
  /** Normalized searchable text */
  text: string;
  tagText: string;
  content: string;
  source: string;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isFAQEntry(value: unknown): value is FAQEntry {
  if (typeof value !== 'object' || value === null) return false;
  const e: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  return typeof e.id === 'string' && typeof e.question === 'string' && typeof e.answer === 'string'
    && typeof e.category === 'string' && isStringArray(e.tags);
}

function isGuideEntry(value: unknown): value is GuideEntry {
  if (typeof value !== 'object' || value === null) return false;
  const e: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  return typeof e.id === 'string' && typeof e.title === 'string' && typeof e.content === 'string'
    && typeof e.category === 'string' && isStringArray(e.tags);
}

/**
 * FAQ and guide retrieval. Keyword scoring always; Reciprocal Rank Fusion with
 * vector search once an embedding provider has indexed the corpus.
 */
export class KnowledgeService implements KnowledgeRetriever {
  private faq: FAQEntry[] = [];
  private guides: GuideEntry[] = [];
  private stopWords = new Set<string>();
  private documents: IndexedDocument[] = [];
  private embeddingProvider?: EmbeddingProvider;
  private vectorStore?: VectorStore;
  private readonly log = logger.child({ component: 'knowledge' });

  constructor(private readonly knowledgeDir: string = KNOWLEDGE_DIR) {
    this.loadAll();
  }

  loadAll(): void {
    this.faq = this.loadList('faq.yaml', isFAQEntry);
    this.guides = this.loadList('guides.yaml', isGuideEntry);
    this.stopWords = new Set(this.loadList('stopwords.yaml', (v): v is string => typeof v === 'string').map(normalizeText));
    this.documents = this.buildDocuments();
    this.log.info(
      { faqCount: this.faq.length, guideCount: this.guides.length, stopWordCount: this.stopWords.size },
      'Knowledge base loaded',
    );
  }

  private loadList<T>(filename: string, guard: (v: unknown) => v is T): T[] {
    const filepath = path.join(this.knowledgeDir, filename);
    if (!fs.existsSync(filepath)) {
      this.log.warn({ filepath }, 'Knowledge file not found');
      return [];
    }
    try {
      const parsed: unknown = yaml.load(fs.readFileSync(filepath, 'utf-8'));
      if (!Array.isArray(parsed)) {
        this.log.error({ filepath }, 'Knowledge file is not a list');
        return [];
      }
      const valid = parsed.filter(guard);
      if (valid.length < parsed.length) {
        this.log.warn({ filepath, dropped: parsed.length - valid.length }, 'Malformed knowledge entries skipped');
      }
      return valid;
    } catch (err) {
      this.log.error({ err, filepath }, 'Failed to load knowledge file');
      return [];
    }
  }

  private buildDocuments(): IndexedDocument[] {
    const docs: IndexedDocument[] = [];
    for (const entry of this.faq) {
      docs.push({
        id: `faq-${entry.id}`,
        type: 'faq',
        text: normalizeText(`${entry.question} ${entry.answer} ${entry.tags.join(' ')}`),
        tagText: normalizeText(entry.tags.join(' ')),
        content: `P: ${entry.question}\nR: ${entry.answer}`,
        source: `faq/${entry.category}/${entry.id}`,
      });
    }
    for (const entry of this.guides) {
      docs.push({
        id: `guide-${entry.id}`,
        type: 'guide',
        text: normalizeText(`${entry.title} ${entry.content} ${entry.tags.join(' ')}`),
        tagText: normalizeText(entry.tags.join(' ')),
        content: `Guía: ${entry.title}\n${entry.content}`,
        source: `guide/${entry.category}/${entry.id}`,
      });
    }
    return docs;
  }

  /**
   * Drop stop words; if every term is one ("qué es eso"), keep the originals.
   */
  queryTerms(query: string): string[] {
    const raw = normalizeText(query).split(/[^\p{L}\p{N}]+/u).filter(Boolean);
    const meaningful = raw.filter((t) => !this.stopWords.has(t) && t.length > 1);
    return meaningful.length > 0 ? meaningful : raw;
  }

  /** Fraction of terms found in the text; tag hits weigh 1.5 */
  private scoreText(doc: IndexedDocument, terms: string[]): number {
    if (terms.length === 0) return 0;
    let score = 0;
    for (const term of terms) {
      if (doc.text.includes(term)) {
        score += 1;
        if (doc.tagText.includes(term)) score += 0.5;
      }
    }
    return score / terms.length;
  }

  search(query: string, topK = 5): KnowledgePassage[] {
    const terms = this.queryTerms(query);
    const results: KnowledgePassage[] = [];

    for (const doc of this.documents) {
      const relevance = this.scoreText(doc, terms);
      if (relevance > MIN_KEYWORD_SCORE) {
        results.push({ type: doc.type, content: doc.content, relevance, source: doc.source });
      }
    }

    return results.sort((a, b) => b.relevance - a.relevance).slice(0, topK);
  }

  async retrieve(query: string, topK: number, signal?: AbortSignal): Promise<KnowledgePassage[]> {
    if (topK <= 0) return [];
    return this.isVectorSearchReady ? this.hybridSearch(query, topK, signal) : this.search(query, topK);
  }

  // ───── Hybrid Search (keyword + vector) ──────────────────────

  setEmbeddingProvider(provider: EmbeddingProvider): void {
    this.embeddingProvider = provider;
    this.vectorStore = new VectorStore();
  }

  get isVectorSearchReady(): boolean {
    return this.vectorStore !== undefined && this.vectorStore.size > 0;
  }

  /** Batch-embed every document. Called once at startup when RAG is enabled. */
  async initializeVectorIndex(): Promise<void> {
    if (!this.embeddingProvider || !this.vectorStore) {
      this.log.warn('Cannot initialize vector index: embedding provider not set');
      return;
    }
    if (this.documents.length === 0) {
      this.log.warn('No documents to index for vector search');
      return;
    }

    const startTime = Date.now();
    this.vectorStore.clear();

    try {
      const embeddings = await this.embeddingProvider.embedBatch(this.documents.map((d) => d.text));
      const entries: VectorEntry[] = this.documents.map((doc, i) => ({
        id: doc.id,
        embedding: embeddings[i],
        metadata: { type: doc.type, content: doc.content, source: doc.source },
      }));
      this.vectorStore.addEntries(entries);
      this.log.info({ docCount: entries.length, durationMs: Date.now() - startTime }, 'Vector index initialized');
    } catch (err) {
      this.log.error({ err }, 'Failed to initialize vector index');
    }
  }

  /**
   * Reciprocal Rank Fusion of keyword and vector rankings. A failed embedding
   * call degrades to keyword-only.
   */
  async hybridSearch(query: string, topK: number, signal?: AbortSignal, alpha = 0.5): Promise<KnowledgePassage[]> {
    const keywordResults = this.search(query, topK * 2);

    let vectorResults: KnowledgePassage[] = [];
    if (this.embeddingProvider && this.vectorStore && this.vectorStore.size > 0) {
      try {
        const queryEmbedding = await this.embeddingProvider.embed(query, signal);
        vectorResults = this.vectorStore.search(queryEmbedding, topK * 2, MIN_VECTOR_SCORE);
      } catch (err) {
        if (signal?.aborted) throw err;
        this.log.warn({ err }, 'Vector search failed, using keyword-only');
      }
    }

    if (vectorResults.length === 0) {
      return keywordResults.slice(0, topK);
    }

    const fused = new Map<string, { score: number; passage: KnowledgePassage }>();
    const accumulate = (results: KnowledgePassage[], weight: number): void => {
      results.forEach((passage, rank) => {
        const rrf = weight / (RRF_K + rank + 1);
        const existing = fused.get(passage.source);
        if (existing) {
          existing.score += rrf;
        } else {
          fused.set(passage.source, { score: rrf, passage });
        }
      });
    };
    accumulate(keywordResults, 1 - alpha);
    accumulate(vectorResults, alpha);

    return [...fused.values()]
      .sort((a, b) => b.score - a.score)
      .slice(0, topK)
      .map((f) => ({ ...f.passage, relevance: f.score }));
  }
}
