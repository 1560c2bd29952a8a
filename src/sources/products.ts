import { COLLECTIONS } from '../config.js';
import type { IndexDocument } from '../db/types.js';
import { IngestionError } from '../ingest/errors.js';
import { runAggregateSource, type IngestionContext, type RunTally } from '../ingest/loaders.js';
import type { Logger } from '../logger.js';
import { registerDate } from './firms-register.js';
import { discoverReferences, field, firstRecord, recordList, registerCall, registerDetail } from './register-api.js';
import { joinNonEmpty } from './text.js';

export const PRODUCT_SEARCH_TERMS = ['fund', 'investment', 'trust', 'scheme', 'portfolio'] as const;

const HITS_PER_TERM = 20;
const MAX_PRODUCTS = 100;
const REGISTER_WEB_URL = 'https://register.fca.org.uk/s/search?predefined=CIS&q=';

export interface SubFund {
  name: string;
  type: string;
}

export interface ProductOtherName {
  name: string;
  effectiveFrom: string;
  effectiveTo: string;
}

export interface InvestmentProduct {
  prn: string;
  operatorName: string;
  productType: string;
  schemeType: string;
  status: string;
  effectiveDate: string;
  depositaryName: string;
  subfunds: SubFund[];
  otherNames: ProductOtherName[];
}

export async function loadProduct(
  context: IngestionContext,
  prn: string,
  logger: Logger,
  signal?: AbortSignal,
): Promise<InvestmentProduct | null> {
  const details = firstRecord(await registerDetail(context, `/CIS/${prn}`, logger, signal));
  if (!details) {
    logger.debug({ prn }, 'no product details');
    return null;
  }

  const [subfunds, names] = await Promise.all([
    registerCall(context, `/CIS/${prn}/Subfund`, logger, signal),
    registerCall(context, `/CIS/${prn}/Names`, logger, signal),
  ]);

  return {
    prn,
    operatorName: field(details, 'Operator Name'),
    productType: field(details, 'Product Type'),
    schemeType: field(details, 'Scheme Type'),
    status: field(details, 'Status'),
    effectiveDate: field(details, 'Effective Date'),
    depositaryName: field(details, 'CIS Depositary Name'),
    subfunds: recordList(subfunds?.data ?? null).map((subfund) => ({
      name: field(subfund, 'Name'),
      type: field(subfund, 'Sub-Fund Type'),
    })),
    otherNames: recordList(names?.data ?? null).map((name) => ({
      name: field(name, 'Product Other Name'),
      effectiveFrom: field(name, 'Effective From'),
      effectiveTo: field(name, 'Effective To'),
    })),
  };
}

export function productToDocument(product: InvestmentProduct): IndexDocument {
  const currentName = product.otherNames.find((name) => !name.effectiveTo)?.name;
  return {
    key: `product_${product.prn}`,
    title: currentName || `${product.productType || 'Product'} ${product.prn}`,
    body: joinNonEmpty([
      `PRN ${product.prn} - ${product.status}`,
      product.operatorName ? `Operator: ${product.operatorName}` : null,
      joinNonEmpty([product.productType, product.schemeType], ', '),
      product.depositaryName ? `Depositary: ${product.depositaryName}` : null,
      product.subfunds.map((subfund) => joinNonEmpty([subfund.name, subfund.type], ' - ')).join('\n'),
      product.otherNames.map((name) => name.name).join(', '),
    ]),
    date: registerDate(product.effectiveDate),
    url: `${REGISTER_WEB_URL}${product.prn}`,
    payload: { ...product },
  };
}

export async function loadProducts(context: IngestionContext, tally: RunTally): Promise<void> {
  const logger = context.logger.child({ source: 'products' });

  await runAggregateSource(
    context,
    {
      label: 'products',
      collection: COLLECTIONS.products,
      discover: async (signal) => {
        const { references, failedTerms } = await discoverReferences(
          context,
          PRODUCT_SEARCH_TERMS,
          'fund',
          HITS_PER_TERM,
          logger,
          signal,
        );
        if (failedTerms.length === PRODUCT_SEARCH_TERMS.length) {
          throw new IngestionError('every product search failed');
        }
        return references.slice(0, MAX_PRODUCTS);
      },
      loadItem: (prn, signal) => loadProduct(context, prn, logger, signal),
      toDocument: productToDocument,
    },
    tally,
  );
}
