import { z } from 'zod';

import { COLLECTIONS } from '../config.js';
import type { IndexDocument } from '../db/types.js';
import { IngestionError, ValidationError, errorMessage } from '../ingest/errors.js';
import { runPaginatedSource, type DateRange, type IngestionContext, type RunTally } from '../ingest/loaders.js';
import { fetchTotalCount } from '../ingest/paginate.js';
import { joinNonEmpty, stripMarkup } from './text.js';

const PAGE_SIZE = 50;
const PAGES_IN_FLIGHT = 5;
const QUESTIONS_WEB_URL = 'https://questions-statements.parliament.uk/written-questions/detail';
const TRUNCATION_MARKER = '...';

const memberSchema = z
  .object({
    id: z.number().int(),
    name: z.string().nullable().optional(),
    party: z.string().nullable().optional(),
    memberFrom: z.string().nullable().optional(),
  })
  .passthrough();

export const questionSchema = z
  .object({
    id: z.number().int(),
    askingMemberId: z.number().int(),
    askingMember: memberSchema.nullable().optional(),
    house: z.string(),
    dateTabled: z.string(),
    dateForAnswer: z.string().nullable().optional(),
    uin: z.string().nullable().optional(),
    heading: z.string().nullable().optional(),
    questionText: z.string().nullable().optional(),
    answeringBodyId: z.number().int(),
    answeringBodyName: z.string().nullable().optional(),
    isWithdrawn: z.boolean(),
    answeringMember: memberSchema.nullable().optional(),
    dateAnswered: z.string().nullable().optional(),
    answerText: z.string().nullable().optional(),
  })
  .passthrough();

export type ParliamentaryQuestion = z.infer<typeof questionSchema>;

const questionsPageSchema = z.object({
  results: z.array(z.object({ value: questionSchema })),
  totalResults: z.number().int().nonnegative(),
});

const singleQuestionSchema = z.object({ value: questionSchema });

export function parseQuestionsPage(body: unknown): ParliamentaryQuestion[] {
  const parsed = questionsPageSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError('malformed written questions page', parsed.error.issues);
  }
  return parsed.data.results.map((result) => result.value);
}

export function isTruncated(question: ParliamentaryQuestion): boolean {
  return Boolean(
    question.questionText?.endsWith(TRUNCATION_MARKER) || question.answerText?.endsWith(TRUNCATION_MARKER),
  );
}

/** Replaces truncated summary text with the single-question endpoint's full text. */
export async function expandTruncatedQuestion(
  context: IngestionContext,
  question: ParliamentaryQuestion,
  signal?: AbortSignal,
): Promise<ParliamentaryQuestion> {
  if (!isTruncated(question)) {
    return question;
  }

  const body = await context.http.fetchJson(
    {
      url: `${context.settings.questionsBaseUrl}/writtenquestions/questions/${question.id}`,
      params: { expandMember: 'true' },
    },
    signal,
  );
  const parsed = singleQuestionSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(`malformed written question ${question.id}`, parsed.error.issues);
  }

  return {
    ...question,
    questionText: parsed.data.value.questionText,
    answerText: parsed.data.value.answerText,
  };
}

export function questionToDocument(question: ParliamentaryQuestion): IndexDocument {
  const tabled = question.dateTabled.slice(0, 10);
  const asker = question.askingMember?.name;

  return {
    key: `pq_${question.id}`,
    title: question.heading ?? `Written question ${question.uin ?? question.id}`,
    body: joinNonEmpty([
      asker ? `Asked by ${asker}` : null,
      question.questionText,
      question.answerText ? stripMarkup(question.answerText) : null,
    ]),
    date: tabled,
    url: question.uin ? `${QUESTIONS_WEB_URL}/${tabled}/${question.uin}` : null,
    payload: question,
  };
}

type QuestionPass = 'tabled' | 'answered';

const PASS_PARAMS: Record<QuestionPass, (range: DateRange) => Record<string, string>> = {
  tabled: (range) => ({ tabledWhenFrom: range.from, tabledWhenTo: range.to }),
  answered: (range) => ({ answeredWhenFrom: range.from, answeredWhenTo: range.to }),
};

/**
 * Questions tabled in the window, then questions answered in it. A question
 * seen in either pass is indexed once.
 */
export async function loadParliamentaryQuestions(
  context: IngestionContext,
  range: DateRange,
  tally: RunTally,
): Promise<void> {
  const url = `${context.settings.questionsBaseUrl}/writtenquestions/questions`;
  const seen = new Set<number>();
  const failures: string[] = [];

  const takeUnseen = (questions: ParliamentaryQuestion[]): ParliamentaryQuestion[] =>
    questions.filter((question) => {
      if (seen.has(question.id)) {
        return false;
      }
      seen.add(question.id);
      return true;
    });

  for (const pass of ['tabled', 'answered'] as const) {
    const baseParams = { ...PASS_PARAMS[pass](range), expandMember: 'true' };
    try {
      await runPaginatedSource(
        context,
        {
          label: `parliamentary-questions:${pass}`,
          collection: COLLECTIONS.parliamentaryQuestions,
          pageSize: PAGE_SIZE,
          concurrency: PAGES_IN_FLIGHT,
          countQuery: (signal) =>
            fetchTotalCount(context.http, { url, params: { ...baseParams, take: 1, skip: 0 } }, 'totalResults', signal),
          fetchPage: (page, signal) =>
            context.http.fetchJson({ url, params: { ...baseParams, take: page.size, skip: page.offset } }, signal),
          parsePage: parseQuestionsPage,
          select: takeUnseen,
          enrich: (question, signal) => expandTruncatedQuestion(context, question, signal),
          toDocument: questionToDocument,
        },
        tally,
      );
    } catch (error) {
      context.signal?.throwIfAborted();
      failures.push(`${pass}: ${errorMessage(error)}`);
    }
  }

  if (failures.length > 0) {
    throw new IngestionError(`written questions passes failed (${failures.join('; ')})`);
  }
}
