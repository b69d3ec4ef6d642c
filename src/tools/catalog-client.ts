/**
 * Catalog client: plans, releases and royalty statements the read-only
 * tools query. The file-backed client serves a JSON snapshot.
 */

import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../observability/logger';

export type PlanTier = 'basic' | 'professional' | 'premium';

export interface Plan {
  monthly: number;
  yearly: number;
  features: string[];
}

export type PlatformStatus = 'active' | 'pending' | 'rejected' | 'removed';

export interface Release {
  releaseId: string;
  title: string;
  artist: string;
  status: 'live' | 'processing' | 'partial' | 'takedown';
  distributionDate: string;
  platforms: Record<string, PlatformStatus>;
  streamsTotal: number;
}

export interface RoyaltyStatement {
  period: string;
  totalEarned: number;
  totalStreams: number;
  paymentStatus: 'paid' | 'pending' | 'on_hold';
  paymentDate: string;
  breakdown: Record<string, number>;
}

interface CatalogData {
  plans: Record<PlanTier, Plan>;
  releases: Release[];
  royalties: RoyaltyStatement[];
}

export interface CatalogClient {
  getPlan(tier: PlanTier, signal?: AbortSignal): Promise<Plan>;
  /** Match by release id, or by title when no id matches */
  findRelease(query: string, signal?: AbortSignal): Promise<Release | null>;
  /** `period` is YYYY-MM or one of current_month / last_month */
  getRoyalties(period: string, signal?: AbortSignal): Promise<RoyaltyStatement | null>;
}

// Resolve from project root (2 levels up from dist/tools/ or src/tools/)
const DEFAULT_CATALOG_PATH = path.resolve(__dirname, '..', '..', 'data', 'catalog.json');

export function resolvePeriod(period: string, now: Date): string {
  const trimmed = period.trim().toLowerCase();
  if (trimmed === 'current_month' || trimmed === 'last_month') {
    const offset = trimmed === 'last_month' ? 1 : 0;
    const d = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - offset, 1));
    return `${d.getUTCFullYear()}-${String(d.getUTCMonth() + 1).padStart(2, '0')}`;
  }
  return trimmed;
}

export class FileCatalogClient implements CatalogClient {
  private readonly data: CatalogData;

  constructor(
    filePath: string = DEFAULT_CATALOG_PATH,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.data = JSON.parse(fs.readFileSync(filePath, 'utf-8')) as CatalogData;
    logger.info(
      { plans: Object.keys(this.data.plans).length, releases: this.data.releases.length },
      'Catalog loaded',
    );
  }

  async getPlan(tier: PlanTier): Promise<Plan> {
    return this.data.plans[tier];
  }

  async findRelease(query: string): Promise<Release | null> {
    const q = query.trim().toLowerCase();
    return (
      this.data.releases.find((r) => r.releaseId.toLowerCase() === q) ??
      this.data.releases.find((r) => r.title.toLowerCase() === q) ??
      null
    );
  }

  async getRoyalties(period: string): Promise<RoyaltyStatement | null> {
    const resolved = resolvePeriod(period, this.now());
    return this.data.royalties.find((r) => r.period === resolved) ?? null;
  }
}
