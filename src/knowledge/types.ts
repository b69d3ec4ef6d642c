export interface FAQEntry {
  id: string;
  question: string;
  answer: string;
  tags: string[];
  category: string;
}

export interface GuideEntry {
  id: string;
  title: string;
  content: string;
  tags: string[];
  category: string;
}

export type PassageType = 'faq' | 'guide';

/** One retrieved passage; results are ordered by descending relevance */
export interface KnowledgePassage {
  type: PassageType;
  content: string;
  relevance: number;
  source: string;
}

/** Read-only, best-effort retrieval. An empty result is valid. */
export interface KnowledgeRetriever {
  retrieve(query: string, topK: number, signal?: AbortSignal): Promise<KnowledgePassage[]>;
}
