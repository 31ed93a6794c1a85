/**
 * Detail Page Extraction Strategies
 *
 * Each strategy reads one kind of markup and returns whatever fields it can
 * find. The detail extractor runs them in order and merges per field: the
 * first strategy to supply a non-empty value wins, independently for every
 * field.
 */

import * as cheerio from 'cheerio';
import { z } from 'zod';
import type { ProductFields } from '../types/index.js';
import type { StoreSelectors } from './store-selectors.js';

export interface ExtractionStrategy {
  readonly name: string;
  extract($: cheerio.CheerioAPI): ProductFields;
}

const SCALAR_FIELDS = [
  'title',
  'price',
  'currency',
  'brand',
  'condition',
  'productType',
  'mpn',
  'sku',
  'availability',
  'description',
] as const;

/** Class-based price markup common to storefront themes */
const PRICE_CLASS_SELECTORS = [
  '.price',
  '.product-price',
  '.current-price',
  '[data-price]',
  '.woocommerce-Price-amount',
] as const;

const PRICE_NUMBER = /[\d,.]+/;
const SCHEMA_ORG_PREFIX = /^https?:\/\/schema\.org\//;

/** Labels this long are prose that happened to match the row markup */
const MAX_LABEL_LENGTH = 80;

// Every field falls back to undefined on a shape mismatch so one odd value
// does not discard the rest of the block
const offerSchema = z.object({
  price: z.union([z.string(), z.number()]).optional().catch(undefined),
  priceCurrency: z.string().optional().catch(undefined),
  itemCondition: z.string().optional().catch(undefined),
  availability: z.string().optional().catch(undefined),
});

const productSchema = z.object({
  '@type': z.union([z.string(), z.array(z.string())]),
  name: z.string().optional().catch(undefined),
  description: z.string().optional().catch(undefined),
  mpn: z.string().optional().catch(undefined),
  sku: z.string().optional().catch(undefined),
  image: z.union([z.string(), z.array(z.string())]).optional().catch(undefined),
  brand: z
    .union([z.string(), z.object({ name: z.string().optional().catch(undefined) })])
    .optional()
    .catch(undefined),
  offers: z.union([offerSchema, z.array(offerSchema)]).optional().catch(undefined),
});

type StructuredProduct = z.infer<typeof productSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Candidate nodes of one JSON-LD block: the block itself, array members and
 * `@graph` members
 */
function structuredNodes(data: unknown): unknown[] {
  if (Array.isArray(data)) {
    return data.flatMap(structuredNodes);
  }
  if (isRecord(data)) {
    const graph = data['@graph'];
    return Array.isArray(graph) ? [data, ...graph] : [data];
  }
  return [];
}

function isProductType(type: string | string[]): boolean {
  return Array.isArray(type) ? type.includes('Product') : type === 'Product';
}

function parseJsonLdBlocks($: cheerio.CheerioAPI): unknown[] {
  const blocks: unknown[] = [];
  for (const script of $('script[type="application/ld+json"]').toArray()) {
    try {
      blocks.push(JSON.parse($(script).text()));
    } catch {
      continue; // blocks with syntax errors are common and carry nothing usable
    }
  }
  return blocks;
}

export function findStructuredProduct($: cheerio.CheerioAPI): StructuredProduct | null {
  for (const data of parseJsonLdBlocks($)) {
    for (const node of structuredNodes(data)) {
      const parsed = productSchema.safeParse(node);
      if (parsed.success && isProductType(parsed.data['@type'])) {
        return parsed.data;
      }
    }
  }
  return null;
}

/**
 * `@type` values declared by the page's JSON-LD nodes, in document order
 */
export function structuredDataTypes($: cheerio.CheerioAPI): string[] {
  const types: string[] = [];
  for (const node of parseJsonLdBlocks($).flatMap(structuredNodes)) {
    if (!isRecord(node)) {
      continue;
    }
    const type = node['@type'];
    for (const value of [type].flat()) {
      if (typeof value === 'string' && value) {
        types.push(value);
      }
    }
  }
  return types;
}

/**
 * schema.org Product blocks in `<script type="application/ld+json">`
 */
export const structuredDataStrategy: ExtractionStrategy = {
  name: 'structured-data',
  extract($) {
    const product = findStructuredProduct($);
    if (!product) {
      return {};
    }

    const offer = Array.isArray(product.offers) ? product.offers[0] : product.offers;
    const brand = typeof product.brand === 'string' ? product.brand : product.brand?.name;
    const images = product.image === undefined ? [] : [product.image].flat();

    return {
      title: product.name,
      description: product.description,
      mpn: product.mpn,
      sku: product.sku,
      availability: offer?.availability?.replace(SCHEMA_ORG_PREFIX, ''),
      brand,
      images: images.filter((src) => src.trim().length > 0),
      price: offer?.price === undefined ? undefined : String(offer.price),
      currency: offer?.priceCurrency,
      condition: offer?.itemCondition?.replace(SCHEMA_ORG_PREFIX, ''),
    };
  },
};

/**
 * Label/value rows of the item specifics section
 */
export function specificsStrategy(selectors: StoreSelectors): ExtractionStrategy {
  const { row, label, value } = selectors.specifics;

  return {
    name: 'item-specifics',
    extract($) {
      const specifics: Record<string, string> = {};

      $(row).each((_, el) => {
        const key = normalizeText($(el).find(label).first().text()).replace(/:$/, '').trim();
        const text = normalizeText($(el).find(value).first().text());
        if (key && text && key.length < MAX_LABEL_LENGTH && !(key in specifics)) {
          specifics[key] = text;
        }
      });

      return {
        specifics,
        brand: specifics['Brand'],
        productType: specifics['Type'] || specifics['Bulb Type'],
        mpn: specifics['Manufacturer Part Number'] || specifics['MPN'],
        condition: specifics['Condition'],
      };
    },
  };
}

/**
 * Inline `itemprop` microdata
 */
export const microdataStrategy: ExtractionStrategy = {
  name: 'microdata',
  extract($) {
    const prop = (name: string) => $(`[itemprop="${name}"]`).first();
    const contentOrText = (name: string) => {
      const el = prop(name);
      return el.length === 0 ? undefined : normalizeText(el.attr('content') ?? el.text());
    };

    const images = $('[itemprop="image"]')
      .toArray()
      .map((el) => $(el).attr('src') ?? $(el).attr('content') ?? '')
      .filter((src) => src.length > 0);

    return {
      title: contentOrText('name'),
      price: contentOrText('price'),
      currency: contentOrText('priceCurrency'),
      brand: contentOrText('brand'),
      mpn: contentOrText('mpn'),
      sku: contentOrText('sku'),
      availability: contentOrText('availability')?.replace(SCHEMA_ORG_PREFIX, ''),
      images,
    };
  },
};

/**
 * First number inside common price classes, for pages without price markup
 */
export const priceClassStrategy: ExtractionStrategy = {
  name: 'price-class',
  extract($) {
    for (const selector of PRICE_CLASS_SELECTORS) {
      const match = normalizeText($(selector).first().text()).match(PRICE_NUMBER);
      if (match) {
        return { price: match[0] };
      }
    }
    return {};
  },
};

/**
 * Primary heading as a last-resort title
 */
export function headingStrategy(selectors: StoreSelectors): ExtractionStrategy {
  return {
    name: 'heading',
    extract($) {
      return { title: normalizeText($(selectors.heading).first().text()) };
    },
  };
}

export function createDefaultStrategies(selectors: StoreSelectors): ExtractionStrategy[] {
  return [
    structuredDataStrategy,
    specificsStrategy(selectors),
    microdataStrategy,
    headingStrategy(selectors),
    priceClassStrategy,
  ];
}

/**
 * Merge strategy outputs in priority order, field by field
 */
export function mergeProductFields(partials: ProductFields[]): ProductFields {
  const merged: ProductFields = {};

  for (const field of SCALAR_FIELDS) {
    const value = partials.map((partial) => partial[field]?.trim()).find((candidate) => !!candidate);
    if (value) {
      merged[field] = value;
    }
  }

  const images = partials.find((partial) => partial.images && partial.images.length > 0)?.images;
  if (images) {
    merged.images = [...new Set(images)];
  }

  const specifics = partials.find((partial) => partial.specifics && Object.keys(partial.specifics).length > 0)?.specifics;
  if (specifics) {
    merged.specifics = specifics;
  }

  return merged;
}

/**
 * Run strategies against a page in order and merge their output
 */
export function runStrategies(html: string, strategies: readonly ExtractionStrategy[]): ProductFields {
  const $ = cheerio.load(html);
  return mergeProductFields(strategies.map((strategy) => strategy.extract($)));
}
