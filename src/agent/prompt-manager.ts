import * as fs from 'fs';
import * as path from 'path';
import { AutomatedAgentId } from '../config/types';
import { ClassifierName, PromptBundle } from './types';
import { logger } from '../observability/logger';

// Resolve from project root (2 levels up from dist/agent/ or src/agent/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const DEFAULT_PROMPTS_DIR = path.resolve(PROJECT_ROOT, 'prompts');

interface VersionsFile {
  versions: Record<string, {
    system: string;
    brandTone: string;
    governance: string;
    approved: boolean;
    approvedBy?: string;
    approvedAt?: string;
  }>;
  default: string;
}

export class PromptManager {
  private bundles: Map<string, PromptBundle> = new Map();
  private defaultVersion: string = 'v1';

  constructor(private readonly promptsDir: string = DEFAULT_PROMPTS_DIR) {
    this.loadAll();
  }

  loadAll(): void {
    this.bundles.clear();

    const versionsPath = path.join(this.promptsDir, 'versions.json');
    if (!fs.existsSync(versionsPath)) {
      logger.warn('prompts/versions.json not found; building default bundle from markdown files');
      this.loadFallbackBundle();
      return;
    }

    try {
      const raw = fs.readFileSync(versionsPath, 'utf-8');
      const versionsFile = JSON.parse(raw) as VersionsFile;
      this.defaultVersion = versionsFile.default;

      for (const [version, meta] of Object.entries(versionsFile.versions)) {
        if (!meta.approved) {
          logger.warn({ version }, 'Prompt version not approved; skipping');
          continue;
        }
        this.bundles.set(version, this.buildBundle(version, meta.system, meta.brandTone, meta.governance));
        logger.info({ version, approvedBy: meta.approvedBy }, 'Loaded prompt bundle');
      }
    } catch (err) {
      logger.error({ err }, 'Failed to load prompt versions');
      this.loadFallbackBundle();
    }
  }

  get(version?: string): PromptBundle {
    const v = version ?? this.defaultVersion;
    const bundle = this.bundles.get(v) ?? this.bundles.get(this.defaultVersion);
    if (!bundle) {
      logger.warn({ version: v }, 'Prompt version not found; using built-in minimum');
      return this.buildBundle('fallback', 'system.md', 'brand_tone.md', 'governance.md');
    }
    return bundle;
  }

  agentPrompt(agent: AutomatedAgentId, version?: string): string {
    return this.get(version).agents[agent];
  }

  classifierPrompt(name: ClassifierName, version?: string): string {
    return this.get(version).classifiers[name];
  }

  private buildBundle(version: string, system: string, brandTone: string, governance: string): PromptBundle {
    const agent = (id: AutomatedAgentId): string =>
      this.readPromptFile(path.join('agents', `${id.toLowerCase()}.md`));
    const classifier = (name: ClassifierName): string =>
      this.readPromptFile(path.join('classifiers', `${name}.md`));

    const agents: Record<AutomatedAgentId, string> = {
      SALES: agent('SALES'),
      SUPPORT: agent('SUPPORT'),
      ROYALTIES: agent('ROYALTIES'),
    };
    const classifiers: Record<ClassifierName, string> = {
      intent: classifier('intent'),
      sentiment: classifier('sentiment'),
      implications: classifier('implications'),
      domain: classifier('domain'),
      malicious: classifier('malicious'),
    };
    return {
      version,
      system: this.readPromptFile(system),
      brandTone: this.readPromptFile(brandTone),
      governance: this.readPromptFile(governance),
      agents,
      classifiers,
    };
  }

  private readPromptFile(filename: string): string {
    const filepath = path.join(this.promptsDir, filename);
    if (!fs.existsSync(filepath)) {
      logger.warn({ filepath }, 'Prompt file not found');
      return '';
    }
    return fs.readFileSync(filepath, 'utf-8');
  }

  private loadFallbackBundle(): void {
    this.bundles.set('v1', this.buildBundle('v1', 'system.md', 'brand_tone.md', 'governance.md'));
    this.defaultVersion = 'v1';
  }
}
