import * as cheerio from 'cheerio';
import { cleanText } from '../utils/helper';
import { FieldSelectors, RawGrantField, RawGrantFields } from '../utils/types';

export interface RecordExtractor {
  extract(body: string): RawGrantFields[];
}

type TextField = Exclude<RawGrantField, 'readMoreLink' | 'extraInfo'>;

const TEXT_FIELDS: TextField[] = [
  'issuer',
  'title',
  'cashPrize',
  'entryFee',
  'deadline',
  'genres',
  'description',
];

/**
 * Reads one field-set per listing row. A field whose element is missing from the
 * row is left out, so the crawl can report exactly which fields were absent.
 */
export class ListingRecordExtractor implements RecordExtractor {
  constructor(private readonly selectors: FieldSelectors) {}

  extract(body: string): RawGrantFields[] {
    const $ = cheerio.load(body);
    const records: RawGrantFields[] = [];

    $(this.selectors.row).each((i, elem) => {
      const $row = $(elem);
      const fields: RawGrantFields = {};

      for (const field of TEXT_FIELDS) {
        const $field = $row.find(this.selectors[field]).first();
        if ($field.length > 0) {
          fields[field] = cleanText($field.text());
        }
      }

      const href = $row.find(this.selectors.readMoreLink).first().attr('href');
      if (href !== undefined) {
        fields.readMoreLink = href.trim();
      }

      if (this.selectors.extraInfo) {
        const $extra = $row.find(this.selectors.extraInfo).first();
        if ($extra.length > 0) {
          fields.extraInfo = cleanText($extra.text());
        }
      }

      records.push(fields);
    });

    return records;
  }
}
