import { COLLECTIONS } from '../config.js';
import type { IndexDocument } from '../db/types.js';
import { IngestionError } from '../ingest/errors.js';
import { runAggregateSource, type IngestionContext, type RunTally } from '../ingest/loaders.js';
import type { Logger } from '../logger.js';
import {
  asRecord,
  discoverReferences,
  field,
  firstRecord,
  parseDisciplinaryHistory,
  recordList,
  registerCall,
  registerDetail,
  type DisciplinaryAction,
  type RegisterRecord,
  type RegisterResponse,
} from './register-api.js';
import { joinNonEmpty } from './text.js';

export const FIRM_SEARCH_TERMS = ['ltd', 'limited', 'plc', 'llp', 'limited liability'] as const;

const HITS_PER_TERM = 20;
const MAX_FIRMS = 500;
const FIRMS_PER_BATCH = 3;
const REGISTER_WEB_URL = 'https://register.fca.org.uk/s/firm?id=';

const IGNORED_LIMITATIONS = new Set(['Valid limitation not present', 'Limitation Not Found']);
const IGNORED_REQUIREMENT_FIELDS = new Set([
  'Effective Date',
  'Requirement Reference',
  'Financial Promotions Requirement',
  'Financial Promotions Investment Types',
]);
const PRINCIPAL_ADDRESS = 'Principal Place of Business';

export interface FirmAddress {
  line1: string;
  line2: string;
  line3: string;
  line4: string;
  town: string;
  county: string;
  postcode: string;
  country: string;
  telephone: string;
  website: string;
}

export interface FirmIndividual {
  name: string;
  irn: string;
  status: string;
}

export interface AuthorisedFirm {
  frn: string;
  name: string;
  status: string;
  subStatus: string;
  businessType: string;
  companiesHouseNumber: string;
  clientMoneyPermission: string;
  psdStatus: string;
  mlrsStatus: string;
  statusEffectiveDate: string;
  tradingNames: string[];
  address: FirmAddress | null;
  permissions: string[];
  limitations: string[];
  individuals: FirmIndividual[];
  requirements: string[];
  disciplinaryHistory: DisciplinaryAction[];
  exceptionalInfo: string[];
}

export function parseTradingNames(response: RegisterResponse | null): string[] {
  const names: string[] = [];
  for (const group of recordList(response?.data ?? null)) {
    for (const current of recordList(group['Current Names'])) {
      const name = field(current, 'Name');
      if (name) names.push(name);
    }
    for (const previous of recordList(group['Previous Names'])) {
      const name = field(previous, 'Name');
      if (name) names.push(`${name} (Historical)`);
    }
  }
  return names;
}

export function parseAddress(response: RegisterResponse | null): FirmAddress | null {
  const addresses = recordList(response?.data ?? null);
  const selected =
    addresses.find((address) => field(address, 'Address Type') === PRINCIPAL_ADDRESS) ?? addresses[0] ?? null;
  if (!selected) {
    return null;
  }

  return {
    line1: field(selected, 'Address Line 1'),
    line2: field(selected, 'Address Line 2'),
    line3: field(selected, 'Address Line 3'),
    line4: field(selected, 'Address Line 4'),
    town: field(selected, 'Town'),
    county: field(selected, 'County'),
    postcode: field(selected, 'Postcode'),
    country: field(selected, 'Country'),
    telephone: field(selected, 'Phone Number'),
    website: field(selected, 'Website Address'),
  };
}

/** Permitted activities, and the limitations attached to any of them. */
export function parsePermissions(response: RegisterResponse | null): { permissions: string[]; limitations: string[] } {
  const activities = asRecord(response?.data ?? null);
  if (!activities) {
    return { permissions: [], limitations: [] };
  }

  const permissions: string[] = [];
  const limitations: string[] = [];
  for (const [activity, details] of Object.entries(activities)) {
    permissions.push(activity);
    for (const detail of recordList(details)) {
      for (const [name, values] of Object.entries(detail)) {
        if (!name.includes('Limitation') || !Array.isArray(values)) continue;
        for (const limitation of values) {
          if (typeof limitation === 'string' && !IGNORED_LIMITATIONS.has(limitation)) {
            limitations.push(limitation);
          }
        }
      }
    }
  }
  return { permissions, limitations };
}

export function parseFirmIndividuals(response: RegisterResponse | null): FirmIndividual[] {
  return recordList(response?.data ?? null).map((person) => ({
    name: field(person, 'Name'),
    irn: field(person, 'IRN'),
    status: field(person, 'Status'),
  }));
}

export function parseRequirements(response: RegisterResponse | null): string[] {
  const requirements: string[] = [];
  for (const requirement of recordList(response?.data ?? null)) {
    for (const [name, value] of Object.entries(requirement)) {
      if (!IGNORED_REQUIREMENT_FIELDS.has(name) && typeof value === 'string' && value) {
        requirements.push(`${name}: ${value}`);
      }
    }
  }
  return requirements;
}

function exceptionalInfo(details: RegisterRecord): string[] {
  return recordList(details['Exceptional Info Details'])
    .map((info) => field(info, 'Exceptional Info Body'))
    .filter((body) => body.length > 0);
}

/** Firm detail plus its six sub-resources, fetched concurrently. */
export async function loadFirm(
  context: IngestionContext,
  frn: string,
  logger: Logger,
  signal?: AbortSignal,
): Promise<AuthorisedFirm | null> {
  const details = firstRecord(await registerDetail(context, `/Firm/${frn}`, logger, signal));
  if (!details) {
    logger.debug({ frn }, 'no firm details');
    return null;
  }

  const [names, address, permissions, individuals, requirements, disciplinary] = await Promise.all([
    registerCall(context, `/Firm/${frn}/Names`, logger, signal),
    registerCall(context, `/Firm/${frn}/Address`, logger, signal),
    registerCall(context, `/Firm/${frn}/Permissions`, logger, signal),
    registerCall(context, `/Firm/${frn}/Individuals`, logger, signal),
    registerCall(context, `/Firm/${frn}/Requirements`, logger, signal),
    registerCall(context, `/Firm/${frn}/DisciplinaryHistory`, logger, signal),
  ]);

  return {
    frn,
    name: field(details, 'Organisation Name'),
    status: field(details, 'Status'),
    subStatus: field(details, 'Sub-Status'),
    businessType: field(details, 'Business Type'),
    companiesHouseNumber: field(details, 'Companies House Number'),
    clientMoneyPermission: field(details, 'Client Money Permission'),
    psdStatus: field(details, 'PSD / EMD Status'),
    mlrsStatus: field(details, 'MLRs Status'),
    statusEffectiveDate: field(details, 'Status Effective Date'),
    tradingNames: parseTradingNames(names),
    address: parseAddress(address),
    ...parsePermissions(permissions),
    individuals: parseFirmIndividuals(individuals),
    requirements: parseRequirements(requirements),
    disciplinaryHistory: parseDisciplinaryHistory(disciplinary),
    exceptionalInfo: exceptionalInfo(details),
  };
}

/** Register dates come as DD/MM/YYYY; anything else is kept only if already ISO. */
export function registerDate(value: string): string | null {
  const match = /^(\d{2})\/(\d{2})\/(\d{4})/.exec(value);
  if (match) {
    return `${match[3]}-${match[2]}-${match[1]}`;
  }
  return /^\d{4}-\d{2}-\d{2}/.test(value) ? value.slice(0, 10) : null;
}

export function firmToDocument(firm: AuthorisedFirm): IndexDocument {
  const address = firm.address;
  return {
    key: `firm_${firm.frn}`,
    title: firm.name || `Firm ${firm.frn}`,
    body: joinNonEmpty([
      `${firm.name} (FRN ${firm.frn}) - ${firm.status}`,
      firm.tradingNames.length > 0 ? `Trading names: ${firm.tradingNames.join(', ')}` : null,
      address ? joinNonEmpty([address.line1, address.town, address.postcode, address.country], ', ') : null,
      firm.permissions.length > 0 ? `Permissions: ${firm.permissions.join('; ')}` : null,
      firm.limitations.length > 0 ? `Limitations: ${firm.limitations.join('; ')}` : null,
      firm.requirements.join('\n'),
      firm.individuals.map((individual) => individual.name).join(', '),
      firm.disciplinaryHistory.map((action) => `${action.actionType}: ${action.description}`).join('\n'),
      firm.exceptionalInfo.join('\n'),
    ]),
    date: registerDate(firm.statusEffectiveDate),
    url: `${REGISTER_WEB_URL}${firm.frn}`,
    payload: { ...firm },
  };
}

export async function loadFirmsRegister(context: IngestionContext, tally: RunTally): Promise<void> {
  const logger = context.logger.child({ source: 'firms-register' });

  await runAggregateSource(
    context,
    {
      label: 'firms-register',
      collection: COLLECTIONS.authorisedFirms,
      batchSize: FIRMS_PER_BATCH,
      discover: async (signal) => {
        const { references, failedTerms } = await discoverReferences(
          context,
          FIRM_SEARCH_TERMS,
          'firm',
          HITS_PER_TERM,
          logger,
          signal,
        );
        const known = context.settings.knownFirmReferences;
        if (failedTerms.length === FIRM_SEARCH_TERMS.length && known.length === 0) {
          throw new IngestionError('every firm search failed');
        }
        return [...new Set([...references, ...known])].slice(0, MAX_FIRMS);
      },
      loadItem: (frn, signal) => loadFirm(context, frn, logger, signal),
      toDocument: firmToDocument,
    },
    tally,
  );
}
