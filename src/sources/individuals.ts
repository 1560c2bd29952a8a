import { COLLECTIONS } from '../config.js';
import type { IndexDocument } from '../db/types.js';
import { settleBounded } from '../ingest/concurrency.js';
import { IngestionError, errorMessage } from '../ingest/errors.js';
import { runAggregateSource, type IngestionContext, type RunTally } from '../ingest/loaders.js';
import type { Logger } from '../logger.js';
import { parseFirmIndividuals } from './firms-register.js';
import {
  asRecord,
  field,
  firstRecord,
  parseDisciplinaryHistory,
  recordList,
  registerCall,
  registerDetail,
  type DisciplinaryAction,
  type RegisterResponse,
} from './register-api.js';
import { joinNonEmpty } from './text.js';

const FIRMS_IN_FLIGHT = 3;
const REGISTER_WEB_URL = 'https://register.fca.org.uk/s/individual?id=';

export interface ControlledFunction {
  role: string;
  firmName: string;
  status: 'Current' | 'Previous';
  effectiveDate: string;
  endDate: string | null;
}

export interface RegisteredIndividual {
  irn: string;
  fullName: string;
  commonlyUsedName: string;
  status: string;
  controlledFunctions: ControlledFunction[];
  disciplinaryHistory: DisciplinaryAction[];
}

export function parseControlledFunctions(response: RegisterResponse | null): ControlledFunction[] {
  const functions: ControlledFunction[] = [];
  for (const group of recordList(response?.data ?? null)) {
    for (const status of ['Current', 'Previous'] as const) {
      const roles = asRecord(group[status]);
      if (!roles) continue;
      for (const [role, value] of Object.entries(roles)) {
        const details = asRecord(value);
        functions.push({
          role,
          firmName: field(details, 'Firm Name'),
          status,
          effectiveDate: field(details, 'Effective Date'),
          endDate: status === 'Previous' ? field(details, 'End Date') : null,
        });
      }
    }
  }
  return functions;
}

export async function loadIndividual(
  context: IngestionContext,
  irn: string,
  logger: Logger,
  signal?: AbortSignal,
): Promise<RegisteredIndividual | null> {
  const detail = firstRecord(await registerDetail(context, `/Individuals/${irn}`, logger, signal));
  const details = asRecord(detail?.Details ?? null);
  if (!details) {
    logger.debug({ irn }, 'no individual details');
    return null;
  }

  const [controlled, disciplinary] = await Promise.all([
    registerCall(context, `/Individuals/${irn}/CF`, logger, signal),
    registerCall(context, `/Individuals/${irn}/DisciplinaryHistory`, logger, signal),
  ]);

  return {
    irn,
    fullName: field(details, 'Full Name'),
    commonlyUsedName: field(details, 'Commonly Used Name'),
    status: field(details, 'Status'),
    controlledFunctions: parseControlledFunctions(controlled),
    disciplinaryHistory: parseDisciplinaryHistory(disciplinary),
  };
}

export function individualToDocument(individual: RegisteredIndividual): IndexDocument {
  return {
    key: `individual_${individual.irn}`,
    title: individual.fullName || `Individual ${individual.irn}`,
    body: joinNonEmpty([
      `${individual.fullName} (IRN ${individual.irn}) - ${individual.status}`,
      individual.commonlyUsedName ? `Known as ${individual.commonlyUsedName}` : null,
      individual.controlledFunctions
        .map((role) => `${role.status} ${role.role} at ${role.firmName}`)
        .join('\n'),
      individual.disciplinaryHistory.map((action) => `${action.actionType}: ${action.description}`).join('\n'),
    ]),
    date: null,
    url: `${REGISTER_WEB_URL}${individual.irn}`,
    payload: { ...individual },
  };
}

/** Firms to scan: the configured list, or every firm already indexed. */
export async function firmReferencesToScan(context: IngestionContext): Promise<string[]> {
  if (context.settings.knownFirmReferences.length > 0) {
    return context.settings.knownFirmReferences;
  }
  const keys = await context.store.listKeys(COLLECTIONS.authorisedFirms);
  return keys.filter((key) => key.startsWith('firm_')).map((key) => key.slice('firm_'.length));
}

export async function loadIndividuals(context: IngestionContext, tally: RunTally): Promise<void> {
  const logger = context.logger.child({ source: 'individuals' });

  await runAggregateSource(
    context,
    {
      label: 'individuals',
      collection: COLLECTIONS.individuals,
      discover: async (signal) => {
        const frns = await firmReferencesToScan(context);
        if (frns.length === 0) {
          throw new IngestionError('no firms to scan: load firms-register first or set FCA_KNOWN_FIRM_REFERENCES');
        }

        const settled = await settleBounded(frns, FIRMS_IN_FLIGHT, async (frn) =>
          parseFirmIndividuals(await registerDetail(context, `/Firm/${frn}/Individuals`, logger, signal)),
        );

        signal?.throwIfAborted();

        const irns = new Set<string>();
        let failedListings = 0;
        for (const [index, result] of settled.entries()) {
          if (!result.ok) {
            failedListings++;
            logger.warn({ frn: frns[index], err: errorMessage(result.error) }, 'failed to list firm individuals');
            continue;
          }
          for (const person of result.value) {
            if (person.irn) irns.add(person.irn);
          }
        }
        if (failedListings === frns.length) {
          throw new IngestionError(`every firm individuals listing failed (${frns.length} firms)`);
        }
        return [...irns];
      },
      loadItem: (irn, signal) => loadIndividual(context, irn, logger, signal),
      toDocument: individualToDocument,
    },
    tally,
  );
}
