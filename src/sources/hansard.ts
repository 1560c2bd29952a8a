import { z } from 'zod';

import { COLLECTIONS } from '../config.js';
import type { IndexDocument } from '../db/types.js';
import { settleBounded } from '../ingest/concurrency.js';
import { hashKey } from '../ingest/document-key.js';
import { IngestionError, ValidationError, errorMessage } from '../ingest/errors.js';
import type { HierarchyNode } from '../ingest/hierarchy.js';
import { runPaginatedSource, type DateRange, type IngestionContext, type RunTally } from '../ingest/loaders.js';
import { fetchTotalCount } from '../ingest/paginate.js';
import { stripMarkup } from './text.js';

export const CONTRIBUTION_TYPES = ['Spoken', 'Written', 'Corrections', 'Petitions'] as const;
export type ContributionType = (typeof CONTRIBUTION_TYPES)[number];

const PAGE_SIZE = 100;
const PAGES_IN_FLIGHT = 5;
const HANSARD_WEB_URL = 'https://hansard.parliament.uk';

const optionalString = z.string().nullable().optional();
const optionalInt = z.number().int().nullable().optional();

export const contributionSchema = z.object({
  MemberName: optionalString,
  MemberId: optionalInt,
  AttributedTo: optionalString,
  ItemId: optionalInt,
  ContributionExtId: optionalString,
  ContributionText: optionalString,
  ContributionTextFull: optionalString,
  HRSTag: optionalString,
  HansardSection: optionalString,
  DebateSection: optionalString,
  DebateSectionId: optionalInt,
  DebateSectionExtId: optionalString,
  SittingDate: optionalString,
  Section: optionalString,
  House: optionalString,
  OrderInDebateSection: optionalInt,
  DebateSectionOrder: optionalInt,
  Rank: optionalInt,
  Timecode: optionalString,
});

const contributionsPageSchema = z.object({
  Results: z.array(contributionSchema),
  TotalResultCount: z.number().int().nonnegative(),
});

export type Contribution = z.infer<typeof contributionSchema> & {
  debateParents?: HierarchyNode[];
};

export function parseContributionsPage(body: unknown): Contribution[] {
  const parsed = contributionsPageSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError('malformed contributions page', parsed.error.issues);
  }
  return parsed.data.Results;
}

export function hasFullText(contribution: Contribution): boolean {
  return (contribution.ContributionTextFull ?? '').length > 0;
}

function sittingDay(contribution: Contribution): string | null {
  return contribution.SittingDate ? contribution.SittingDate.slice(0, 10) : null;
}

export function contributionKey(contribution: Contribution): string {
  const section = contribution.DebateSectionExtId ?? '';
  if (contribution.ContributionExtId) {
    return `debate_${section}_contrib_${contribution.ContributionExtId}`;
  }
  const digest = hashKey([section, contribution.ContributionText ?? null, contribution.OrderInDebateSection ?? null]);
  return `debate_${section}_contrib_${digest}`;
}

export function debateUrl(contribution: Contribution): string | null {
  const day = sittingDay(contribution);
  if (!contribution.House || !day || !contribution.DebateSectionExtId) {
    return null;
  }
  return `${HANSARD_WEB_URL}/${contribution.House}/${day}/debates/${contribution.DebateSectionExtId}/link`;
}

export function contributionToDocument(contribution: Contribution): IndexDocument {
  const base = debateUrl(contribution);
  const url = base && contribution.ContributionExtId ? `${base}#contribution-${contribution.ContributionExtId}` : base;
  const speaker = contribution.AttributedTo ?? contribution.MemberName;
  const section = contribution.DebateSection ?? 'Hansard contribution';

  return {
    key: contributionKey(contribution),
    title: speaker ? `${section}: ${speaker}` : section,
    body: stripMarkup(contribution.ContributionTextFull ?? contribution.ContributionText ?? ''),
    date: sittingDay(contribution),
    url,
    payload: {
      ...contribution,
      debateParents: contribution.debateParents ?? [],
      debateUrl: base,
    },
  };
}

export async function attachDebateParents(
  context: IngestionContext,
  contribution: Contribution,
  signal?: AbortSignal,
): Promise<Contribution> {
  const day = sittingDay(contribution);
  const chamber = contribution.House;
  const leaf = contribution.DebateSectionExtId;
  if (!day || !leaf || (chamber !== 'Commons' && chamber !== 'Lords')) {
    return contribution;
  }

  const debateParents = await context.hierarchy.resolveAncestors(day, chamber, leaf, signal);
  return { ...contribution, debateParents };
}

async function loadContributionType(
  context: IngestionContext,
  type: ContributionType,
  range: DateRange,
  tally: RunTally,
): Promise<void> {
  const url = `${context.settings.hansardBaseUrl}/search/contributions/${type}.json`;
  const baseParams = { orderBy: 'SittingDateAsc', startDate: range.from, endDate: range.to };

  await runPaginatedSource(
    context,
    {
      label: `hansard:${type}`,
      collection: COLLECTIONS.hansardContributions,
      pageSize: PAGE_SIZE,
      concurrency: PAGES_IN_FLIGHT,
      countQuery: (signal) =>
        fetchTotalCount(context.http, { url, params: { ...baseParams, take: 1, skip: 0 } }, 'TotalResultCount', signal),
      fetchPage: (page, signal) =>
        context.http.fetchJson({ url, params: { ...baseParams, take: page.size, skip: page.offset } }, signal),
      parsePage: parseContributionsPage,
      isValid: hasFullText,
      enrich: (contribution, signal) => attachDebateParents(context, contribution, signal),
      toDocument: contributionToDocument,
    },
    tally,
  );
}

/** All four contribution types, loaded concurrently. */
export async function loadHansard(context: IngestionContext, range: DateRange, tally: RunTally): Promise<void> {
  const settled = await settleBounded(CONTRIBUTION_TYPES, CONTRIBUTION_TYPES.length, (type) =>
    loadContributionType(context, type, range, tally),
  );

  const failures = settled.flatMap((result, index) =>
    result.ok ? [] : [`${CONTRIBUTION_TYPES[index]}: ${errorMessage(result.error)}`],
  );
  if (failures.length > 0) {
    throw new IngestionError(`hansard contribution types failed (${failures.join('; ')})`);
  }
}
