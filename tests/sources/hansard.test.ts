import { afterEach, describe, expect, it } from 'vitest';

import { COLLECTIONS } from '../../src/config.js';
import { hashKey } from '../../src/ingest/document-key.js';
import { ValidationError } from '../../src/ingest/errors.js';
import {
  contributionKey,
  contributionToDocument,
  hasFullText,
  parseContributionsPage,
  type Contribution,
} from '../../src/sources/hansard.js';
import { loadSource } from '../../src/sources/index.js';
import { reply, type MockHandler } from '../fixtures/mock-transport.js';
import { createTestRuntime, type TestRuntime } from '../fixtures/runtime.js';

const RANGE = { from: '2025-01-06', to: '2025-01-07' };

const spoken: Contribution[] = [
  {
    MemberName: 'Sam Example',
    AttributedTo: 'The Chancellor of the Exchequer (Sam Example)',
    ContributionExtId: 'c1',
    ContributionText: 'Inflation has fallen.',
    ContributionTextFull: '<p>Inflation has <b>fallen</b> &amp; growth returned.</p>',
    DebateSection: 'Economic Update',
    DebateSectionExtId: 'sec-a',
    SittingDate: '2025-01-06T00:00:00',
    House: 'Commons',
    OrderInDebateSection: 1,
  },
  {
    MemberName: 'Robin Sample',
    ContributionExtId: 'c2',
    ContributionText: 'Will the Chancellor give way?',
    ContributionTextFull: 'Will the Chancellor give way?',
    DebateSection: 'Economic Update',
    DebateSectionExtId: 'sec-a',
    SittingDate: '2025-01-06T00:00:00',
    House: 'Commons',
    OrderInDebateSection: 2,
  },
  {
    MemberName: 'Robin Sample',
    ContributionExtId: 'c3',
    ContributionText: 'Hear, hear.',
    ContributionTextFull: '',
    DebateSection: 'Economic Update',
    DebateSectionExtId: 'sec-a',
    SittingDate: '2025-01-06T00:00:00',
    House: 'Commons',
    OrderInDebateSection: 3,
  },
];

function hansardApi(options: { failCountFor?: string } = {}): MockHandler {
  return (url) => {
    const contributions = /^\/search\/contributions\/(\w+)\.json$/.exec(url.pathname);
    if (contributions) {
      const type = contributions[1];
      if (url.searchParams.get('take') === '1') {
        if (type === options.failCountFor) {
          return reply({ error: 'unavailable' }, 503);
        }
        return reply({ Results: [], TotalResultCount: type === 'Spoken' ? spoken.length : 0 });
      }
      return reply({ Results: type === 'Spoken' ? spoken : [], TotalResultCount: spoken.length });
    }
    if (url.pathname === '/overview/sectionsforday.json') {
      return reply([10]);
    }
    if (url.pathname === '/overview/sectiontrees.json') {
      return reply([
        {
          SectionTreeItems: [
            { Id: 1, Title: 'Economy', ParentId: null, ExternalId: 'sec-root' },
            { Id: 2, Title: 'Economic Update', ParentId: 1, ExternalId: 'sec-a' },
          ],
        },
      ]);
    }
    return reply({}, 404);
  };
}

describe('hansard contributions', () => {
  it('keys contributions by debate section and contribution id', () => {
    expect(contributionKey(spoken[0])).toBe('debate_sec-a_contrib_c1');
  });

  it('falls back to a digest of section, text and order without an id', () => {
    const anonymous: Contribution = { ...spoken[2], ContributionExtId: null };

    expect(contributionKey(anonymous)).toBe(`debate_sec-a_contrib_${hashKey(['sec-a', 'Hear, hear.', 3])}`);
  });

  it('builds the indexed document from full text', () => {
    const document = contributionToDocument(spoken[0]);

    expect(document).toMatchObject({
      key: 'debate_sec-a_contrib_c1',
      title: 'Economic Update: The Chancellor of the Exchequer (Sam Example)',
      body: 'Inflation has fallen & growth returned.',
      date: '2025-01-06',
      url: 'https://hansard.parliament.uk/Commons/2025-01-06/debates/sec-a/link#contribution-c1',
    });
    expect(document.payload).toMatchObject({
      debateParents: [],
      debateUrl: 'https://hansard.parliament.uk/Commons/2025-01-06/debates/sec-a/link',
    });
  });

  it('keeps only contributions with full text', () => {
    expect(spoken.map(hasFullText)).toEqual([true, true, false]);
  });

  it('rejects a page without results', () => {
    expect(() => parseContributionsPage({ TotalResultCount: 3 })).toThrow(ValidationError);
  });
});

describe('loadSource(hansard)', () => {
  let runtime: TestRuntime | undefined;

  afterEach(() => {
    runtime?.close();
    runtime = undefined;
  });

  it('indexes every type in the window with debate ancestry', async () => {
    runtime = createTestRuntime(hansardApi());

    const report = await loadSource(runtime.context, 'hansard', RANGE);

    expect(report).toMatchObject({
      source: 'hansard',
      status: 'completed',
      from: '2025-01-06',
      to: '2025-01-07',
      attempted: 2,
      indexed: 2,
      unchanged: 0,
      failed: 0,
      pagesTotal: 1,
      pagesFailed: 0,
      error: null,
    });

    const stored = await runtime.context.store.get(COLLECTIONS.hansardContributions, 'debate_sec-a_contrib_c1');
    expect(stored?.payload.debateParents).toEqual([
      { localId: 2, externalId: 'sec-a', title: 'Economic Update', parentLocalId: 1, parentExternalId: 'sec-root' },
      { localId: 1, externalId: 'sec-root', title: 'Economy', parentLocalId: null, parentExternalId: null },
    ]);
    expect(await runtime.context.store.count(COLLECTIONS.hansardContributions)).toBe(2);
    expect(runtime.context.hierarchy.loadCount).toBe(1);
  });

  it('queries each type with the window and sort order', async () => {
    runtime = createTestRuntime(hansardApi());

    await loadSource(runtime.context, 'hansard', RANGE);

    const urls = runtime.requests.map((request) => request.url);
    expect(urls).toContain(
      'https://hansard.test/search/contributions/Spoken.json?endDate=2025-01-07&orderBy=SittingDateAsc&skip=0&startDate=2025-01-06&take=100',
    );
    for (const type of ['Spoken', 'Written', 'Corrections', 'Petitions']) {
      expect(urls).toContain(
        `https://hansard.test/search/contributions/${type}.json?endDate=2025-01-07&orderBy=SittingDateAsc&skip=0&startDate=2025-01-06&take=1`,
      );
    }
  });

  it('reports unchanged documents on a repeat run', async () => {
    runtime = createTestRuntime(hansardApi());

    await loadSource(runtime.context, 'hansard', RANGE);
    const again = await loadSource(runtime.context, 'hansard', RANGE);

    expect(again).toMatchObject({ status: 'completed', attempted: 2, indexed: 0, unchanged: 2 });
  });

  it('fails the run when one type cannot be counted but keeps the others', async () => {
    runtime = createTestRuntime(hansardApi({ failCountFor: 'Written' }));

    const report = await loadSource(runtime.context, 'hansard', RANGE);

    expect(report.status).toBe('failed');
    expect(report.error).toContain('Written: transient failure');
    expect(report.indexed).toBe(2);

    const rows = runtime.db.prepare('SELECT source, status FROM ingestion_runs').all();
    expect(rows).toEqual([{ source: 'hansard', status: 'failed' }]);
  });

  it('refuses to run without a window', async () => {
    runtime = createTestRuntime(hansardApi());

    await expect(loadSource(runtime.context, 'hansard', null)).rejects.toThrow('hansard needs --from-date');
  });
});
