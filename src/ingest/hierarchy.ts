import { z } from 'zod';

import type { Logger } from '../logger.js';
import { ValidationError, errorMessage } from './errors.js';
import type { RateLimitedCache } from './rate-limited-cache.js';

export type Chamber = 'Commons' | 'Lords';

export interface HierarchyNode {
  localId: number;
  externalId: string;
  title: string;
  parentLocalId: number | null;
  parentExternalId: string | null;
}

interface SectionForest {
  byLocalId: Map<number, HierarchyNode>;
  byExternalId: Map<string, HierarchyNode>;
}

const sectionsForDaySchema = z.array(z.union([z.string(), z.number()]));

const sectionTreeItemSchema = z.object({
  Id: z.number().int(),
  Title: z.string().nullable().optional(),
  ParentId: z.number().int().nullable().optional(),
  ExternalId: z.string(),
});

const sectionTreesSchema = z.array(
  z.object({
    SectionTreeItems: z.array(sectionTreeItemSchema).nullable().optional(),
  }),
);

type SectionTreeItem = z.infer<typeof sectionTreeItemSchema>;

export interface HierarchyResolverOptions {
  baseUrl: string;
  logger: Logger;
  maxForests?: number;
}

/**
 * Debate section ancestry for Hansard contributions. Forests are fetched once
 * per (date, chamber) and kept for the life of the process; a failed load is
 * forgotten so the next lookup tries again.
 */
export class HierarchyResolver {
  private readonly http: RateLimitedCache;
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly maxForests: number;
  private readonly forests = new Map<string, Promise<SectionForest>>();
  private loads = 0;

  constructor(http: RateLimitedCache, options: HierarchyResolverOptions) {
    this.http = http;
    this.baseUrl = options.baseUrl;
    this.logger = options.logger;
    this.maxForests = options.maxForests ?? 128;
  }

  /** Number of forest loads started so far. */
  get loadCount(): number {
    return this.loads;
  }

  /** Ancestor chain ordered leaf to root; empty when anything goes wrong. */
  async resolveAncestors(
    date: string,
    chamber: Chamber,
    leafId: string | number,
    signal?: AbortSignal,
  ): Promise<HierarchyNode[]> {
    try {
      const forest = await this.forest(date, chamber, signal);
      return walk(forest, leafId);
    } catch (error) {
      this.logger.warn({ date, chamber, leafId, err: errorMessage(error) }, 'failed to resolve debate ancestors');
      return [];
    }
  }

  private forest(date: string, chamber: Chamber, signal?: AbortSignal): Promise<SectionForest> {
    const cacheKey = `${date}|${chamber}`;
    const existing = this.forests.get(cacheKey);
    if (existing) {
      this.forests.delete(cacheKey);
      this.forests.set(cacheKey, existing);
      return existing;
    }

    this.loads++;
    const loading = this.loadForest(date, chamber, signal);
    this.forests.set(cacheKey, loading);
    loading.catch(() => {
      if (this.forests.get(cacheKey) === loading) {
        this.forests.delete(cacheKey);
      }
    });

    while (this.forests.size > this.maxForests) {
      const oldest = this.forests.keys().next();
      if (oldest.done) break;
      this.forests.delete(oldest.value);
    }
    return loading;
  }

  private async loadForest(date: string, chamber: Chamber, signal?: AbortSignal): Promise<SectionForest> {
    const sectionsBody = await this.http.fetchJson(
      { url: `${this.baseUrl}/overview/sectionsforday.json`, params: { house: chamber, date } },
      signal,
    );
    const sections = sectionsForDaySchema.safeParse(sectionsBody);
    if (!sections.success) {
      throw new ValidationError(`sections for ${chamber} ${date}`, sections.error.issues);
    }

    const items: SectionTreeItem[] = [];
    for (const section of sections.data) {
      const treeBody = await this.http.fetchJson(
        {
          url: `${this.baseUrl}/overview/sectiontrees.json`,
          params: { section: String(section), date, house: chamber },
        },
        signal,
      );
      const trees = sectionTreesSchema.safeParse(treeBody);
      if (!trees.success) {
        throw new ValidationError(`section tree ${section} for ${chamber} ${date}`, trees.error.issues);
      }
      for (const tree of trees.data) {
        items.push(...(tree.SectionTreeItems ?? []));
      }
    }

    return buildForest(items);
  }
}

function buildForest(items: SectionTreeItem[]): SectionForest {
  const externalByLocal = new Map<number, string>();
  for (const item of items) {
    externalByLocal.set(item.Id, item.ExternalId);
  }

  const byLocalId = new Map<number, HierarchyNode>();
  const byExternalId = new Map<string, HierarchyNode>();
  for (const item of items) {
    const parentLocalId = item.ParentId ?? null;
    const node: HierarchyNode = {
      localId: item.Id,
      externalId: item.ExternalId,
      title: item.Title ?? '',
      parentLocalId,
      parentExternalId: parentLocalId === null ? null : externalByLocal.get(parentLocalId) ?? null,
    };
    byLocalId.set(node.localId, node);
    byExternalId.set(node.externalId, node);
  }
  return { byLocalId, byExternalId };
}

function lookup(forest: SectionForest, id: string | number): HierarchyNode | undefined {
  if (typeof id === 'number') {
    return forest.byLocalId.get(id);
  }
  const byExternal = forest.byExternalId.get(id);
  if (byExternal) {
    return byExternal;
  }
  return /^\d+$/.test(id) ? forest.byLocalId.get(Number(id)) : undefined;
}

function walk(forest: SectionForest, leafId: string | number): HierarchyNode[] {
  const chain: HierarchyNode[] = [];
  const visited = new Set<string>();
  let current = lookup(forest, leafId);

  while (current && !visited.has(current.externalId)) {
    visited.add(current.externalId);
    chain.push(current);
    current = current.parentExternalId === null ? undefined : forest.byExternalId.get(current.parentExternalId);
  }
  return chain;
}
