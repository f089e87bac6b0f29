/**
 * Decoding of front matter into typed fields
 *
 * The raw mapping comes from gray-matter and is typed `any` there; it is
 * checked here once so the rest of the engine works with `Metadata` and
 * `FrontMatter` only.
 */

import { CategorySource, FrontMatter, Metadata, MetadataValue } from '../../types/post';

/**
 * Converts an untyped YAML value into a MetadataValue.
 * Functions, symbols and undefined become null.
 */
export function toMetadataValue(value: unknown): MetadataValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toMetadataValue);
  }
  if (typeof value === 'object') {
    return toMetadata(value);
  }
  return null;
}

/**
 * Converts an untyped mapping (e.g. gray-matter's `data`) into Metadata
 */
export function toMetadata(value: unknown): Metadata {
  const metadata: Metadata = {};
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return metadata;
  }
  for (const [key, entry] of Object.entries(value)) {
    metadata[key] = toMetadataValue(entry);
  }
  return metadata;
}

/**
 * Stringifies a scalar; sequences, mappings and null give undefined
 */
export function scalarToString(value: MetadataValue | undefined): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return undefined;
}

function toStringList(value: MetadataValue | undefined): string[] | undefined {
  if (typeof value === 'string') {
    return value.split(/\s+/).filter((word) => word.length > 0);
  }
  if (Array.isArray(value)) {
    return value
      .map(scalarToString)
      .filter((entry): entry is string => entry !== undefined);
  }
  return undefined;
}

/**
 * YAML 1.1 reads an unquoted `time: 14:30` as the base-60 integer 870;
 * integers below a day's worth of minutes are turned back into "HH:MM".
 */
function decodeTime(value: MetadataValue | undefined): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < 24 * 60) {
    const minutes = String(value % 60).padStart(2, '0');
    return `${Math.floor(value / 60)}:${minutes}`;
  }
  return scalarToString(value) ?? '';
}

function decodeCategories(metadata: Metadata): CategorySource {
  const single = scalarToString(metadata.category);
  if (single !== undefined) {
    return { kind: 'single', value: single };
  }

  const list = toStringList(metadata.categories);
  if (list !== undefined) {
    return { kind: 'list', values: list };
  }

  return { kind: 'none' };
}

/**
 * Decodes the recognized keys of a front matter mapping
 */
export function decodeFrontMatter(metadata: Metadata): FrontMatter {
  return {
    title: scalarToString(metadata.title),
    permalink: scalarToString(metadata.permalink),
    categories: decodeCategories(metadata),
    tags: toStringList(metadata.tags) ?? [],
    time: decodeTime(metadata.time),
    published: metadata.published !== false,
    layout: scalarToString(metadata.layout),
  };
}
