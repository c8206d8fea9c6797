import type { ParameterValue } from './accessors';
import type { ArtifactHandle } from './artifacts';

/** One record of a collection: field name to text */
export type CollectionItem = Record<string, string>;

/**
 * Loop source of the entry function.
 *
 * A count yields the indices `0 .. count - 1`. An artifact yields its records: a JSON array
 * of objects, or a CSV file with a header row when the file name ends in `.csv`.
 */
export function iterate(count: ParameterValue): number[];
export function iterate(source: ArtifactHandle, fileName?: string): CollectionItem[];
export function iterate(
  source: ParameterValue | ArtifactHandle,
  fileName?: string
): number[] | CollectionItem[] {
  if (typeof source === 'boolean') {
    throw new TypeError('iterate() needs a count or an artifact, got a boolean');
  }
  if (typeof source === 'number' || typeof source === 'string') {
    const count = Number(source);
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`iterate() needs a non-negative integer count, got '${source}'`);
    }
    return Array.from({ length: count }, (_, index) => index);
  }

  const name = fileName ?? source.path;
  return name.toLowerCase().endsWith('.csv')
    ? parseCsvRecords(source.read())
    : parseJsonRecords(source.read(), name);
}

export function parseJsonRecords(text: string, name: string = 'collection'): CollectionItem[] {
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) {
    throw new TypeError(`${name} does not contain a JSON array`);
  }
  return parsed.map((entry: unknown, index) => {
    if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
      throw new TypeError(`Item ${index} of ${name} is not an object`);
    }
    const item: CollectionItem = {};
    for (const [key, value] of Object.entries(entry)) {
      item[key] = typeof value === 'string' ? value : JSON.stringify(value);
    }
    return item;
  });
}

/**
 * Rows of a CSV document keyed by the header row. Quoted fields may contain commas, line
 * breaks and doubled quotes; blank lines are skipped.
 */
export function parseCsvRecords(text: string): CollectionItem[] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }
  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  const [header = [], ...records] = rows.filter(r => r.some(cell => cell !== ''));
  return records.map(record => {
    const item: CollectionItem = {};
    header.forEach((name, index) => {
      item[name] = record[index] ?? '';
    });
    return item;
  });
}
