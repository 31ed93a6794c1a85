/**
 * Record Sink
 * Projects records onto the store-import CSV layout and the link-crawl
 * page/image tables.
 */

import type { CrawledPage, DetailRecord, ImageSighting } from '../types/index.js';

export const PRODUCT_COLUMNS = [
  'Handle',
  'Title',
  'Body (HTML)',
  'Vendor',
  'Type',
  'Tags',
  'Published',
  'Option1 Name',
  'Option1 Value',
  'Option2 Name',
  'Option2 Value',
  'Option3 Name',
  'Option3 Value',
  'Variant SKU',
  'Variant Grams',
  'Variant Inventory Tracker',
  'Variant Inventory Qty',
  'Variant Inventory Policy',
  'Variant Fulfillment Service',
  'Variant Price',
  'Variant Compare At Price',
  'Variant Requires Shipping',
  'Variant Taxable',
  'Variant Barcode',
  'Image Src',
  'Image Position',
  'Image Alt Text',
  'Gift Card',
  'SEO Title',
  'SEO Description',
  'Variant Image',
  'Variant Weight Unit',
  'Cost per item',
  'Status',
  'Metafield: custom.car_make [list.single_line_text_field]',
  'Metafield: custom.car_year [list.single_line_text_field]',
] as const;

export type ProductColumn = (typeof PRODUCT_COLUMNS)[number];
export type OutputRow = Record<ProductColumn, string>;

export const PAGE_IMAGE_COLUMNS = [
  'page_url',
  'page_type',
  'page_title',
  'product_name',
  'product_price',
  'product_currency',
  'product_brand',
  'product_sku',
  'product_availability',
  'meta_title',
  'meta_description',
  'h1',
  'canonical_url',
  'og_image',
  'og_title',
  'og_description',
  'word_count',
  'total_image_count',
  'internal_link_count',
  'external_link_count',
  'has_schema_markup',
  'schema_types',
  'image_url',
  'image_alt',
] as const;

export type PageImageRow = Record<(typeof PAGE_IMAGE_COLUMNS)[number], string>;

export const UNIQUE_IMAGE_COLUMNS = ['src', 'alt', 'pages_found_on', 'page_count'] as const;

export type UniqueImageRow = Record<(typeof UNIQUE_IMAGE_COLUMNS)[number], string>;

export const DEFAULT_TAG_FIELDS = [
  'Brand',
  'Technology',
  'Lighting Technology',
  'Bulb Type',
  'Light Colour',
  'Placement on Vehicle',
  'Voltage',
] as const;

export interface RecordSinkOptions {
  vendor: string;
  tagFields?: readonly string[];
}

/**
 * URL-friendly slug: lowercase, punctuation dropped, whitespace and hyphen
 * runs collapsed to one hyphen, at most 200 characters
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/[-\s]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 200);
}

type PageColumns = Omit<PageImageRow, 'image_url' | 'image_alt'>;

function pageColumns(page: CrawledPage): PageColumns {
  const seo = page.details?.seo;
  const metrics = page.details?.metrics;
  const count = (value: number | undefined) => (value === undefined ? '' : String(value));

  return {
    page_url: page.url,
    page_type: page.pageType,
    page_title: page.title,
    product_name: page.product?.title ?? '',
    product_price: page.product?.price ?? '',
    product_currency: page.product?.currency ?? '',
    product_brand: page.product?.brand ?? '',
    product_sku: page.product?.sku ?? '',
    product_availability: page.product?.availability ?? '',
    meta_title: seo?.metaTitle ?? '',
    meta_description: seo?.metaDescription ?? '',
    h1: seo?.h1 ?? '',
    canonical_url: seo?.canonicalUrl ?? '',
    og_image: seo?.ogImage ?? '',
    og_title: seo?.ogTitle ?? '',
    og_description: seo?.ogDescription ?? '',
    word_count: count(metrics?.wordCount),
    total_image_count: count(metrics?.totalImageCount),
    internal_link_count: count(metrics?.internalLinkCount),
    external_link_count: count(metrics?.externalLinkCount),
    has_schema_markup: page.details ? String(page.details.schemaTypes.length > 0) : '',
    schema_types: page.details?.schemaTypes.join(', ') ?? '',
  };
}

function blankPageColumns(): PageColumns {
  return {
    page_url: '',
    page_type: '',
    page_title: '',
    product_name: '',
    product_price: '',
    product_currency: '',
    product_brand: '',
    product_sku: '',
    product_availability: '',
    meta_title: '',
    meta_description: '',
    h1: '',
    canonical_url: '',
    og_image: '',
    og_title: '',
    og_description: '',
    word_count: '',
    total_image_count: '',
    internal_link_count: '',
    external_link_count: '',
    has_schema_markup: '',
    schema_types: '',
  };
}

function emptyRow(handle: string): OutputRow {
  return {
    Handle: handle,
    Title: '',
    'Body (HTML)': '',
    Vendor: '',
    Type: '',
    Tags: '',
    Published: '',
    'Option1 Name': '',
    'Option1 Value': '',
    'Option2 Name': '',
    'Option2 Value': '',
    'Option3 Name': '',
    'Option3 Value': '',
    'Variant SKU': '',
    'Variant Grams': '',
    'Variant Inventory Tracker': '',
    'Variant Inventory Qty': '',
    'Variant Inventory Policy': '',
    'Variant Fulfillment Service': '',
    'Variant Price': '',
    'Variant Compare At Price': '',
    'Variant Requires Shipping': '',
    'Variant Taxable': '',
    'Variant Barcode': '',
    'Image Src': '',
    'Image Position': '',
    'Image Alt Text': '',
    'Gift Card': '',
    'SEO Title': '',
    'SEO Description': '',
    'Variant Image': '',
    'Variant Weight Unit': '',
    'Cost per item': '',
    Status: '',
    'Metafield: custom.car_make [list.single_line_text_field]': '',
    'Metafield: custom.car_year [list.single_line_text_field]': '',
  };
}

export class RecordSink {
  private readonly tagFields: readonly string[];

  constructor(private readonly options: RecordSinkOptions) {
    this.tagFields = options.tagFields ?? DEFAULT_TAG_FIELDS;
  }

  /**
   * Handle derived from the title (or the ID), suffixed with the ID's last
   * four characters
   */
  handleFor(record: DetailRecord): string {
    const base = record.title ? slugify(record.title) : `item-${record.itemId}`;
    return record.itemId ? `${base}-${record.itemId.slice(-4)}` : base;
  }

  /**
   * One row per image (at least one per record). The first row carries every
   * column; the rest only the handle and their image slot.
   */
  toRows(records: readonly DetailRecord[]): OutputRow[] {
    return records.flatMap((record) => this.rowsFor(record));
  }

  private rowsFor(record: DetailRecord): OutputRow[] {
    const handle = this.handleFor(record);
    const [firstImage, ...moreImages] = record.images;
    const tags = this.tagFields
      .map((field) => record.specifics[field])
      .filter((value): value is string => !!value);

    const first: OutputRow = {
      ...emptyRow(handle),
      Title: record.title,
      'Body (HTML)': record.description,
      Vendor: this.options.vendor,
      Type: record.productType,
      Tags: tags.join(', '),
      Published: 'TRUE',
      'Option1 Name': 'Title',
      'Option1 Value': 'Default Title',
      'Variant SKU': record.itemId,
      'Variant Grams': '0',
      'Variant Inventory Policy': 'deny',
      'Variant Fulfillment Service': 'manual',
      'Variant Price': record.price,
      'Variant Requires Shipping': 'TRUE',
      'Variant Taxable': 'TRUE',
      'Image Src': firstImage ?? '',
      'Image Position': firstImage ? '1' : '',
      'Image Alt Text': firstImage ? record.title : '',
      Status: 'active',
      'Metafield: custom.car_make [list.single_line_text_field]': record.compatibility.makes.join(', '),
      'Metafield: custom.car_year [list.single_line_text_field]': record.compatibility.years.join(', '),
    };

    const continuation = moreImages.map((src, index) => ({
      ...emptyRow(handle),
      'Image Src': src,
      'Image Position': String(index + 2),
    }));

    return [first, ...continuation];
  }

  /**
   * One row per page image; page columns only on each page's first row.
   * Pages without images are left out unless they carry full-data details,
   * which then get a single row with empty image columns.
   */
  pageImageRows(pages: readonly CrawledPage[]): PageImageRow[] {
    return pages.flatMap((page) => {
      const images = page.images.length === 0 && page.details ? [{ src: '', alt: '' }] : page.images;
      return images.map((image, index) => ({
        ...(index === 0 ? pageColumns(page) : blankPageColumns()),
        image_url: image.src,
        image_alt: image.alt,
      }));
    });
  }

  uniqueImageRows(images: readonly ImageSighting[]): UniqueImageRow[] {
    return images.map((image) => ({
      src: image.src,
      alt: image.alt,
      pages_found_on: JSON.stringify(image.foundOn),
      page_count: String(image.foundOn.length),
    }));
  }
}
