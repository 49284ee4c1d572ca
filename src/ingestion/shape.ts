import { ShapeError } from '../lib/errors';
import type { PageRecord, StorageRecord } from './types';

/**
 * Serializes a flat object as JSON with `", "` and `": "` separators,
 * keeping the key order of `entries`. Stored metadata is compared as text,
 * so the layout must not drift.
 */
export function serializeMetadata(
  entries: ReadonlyArray<readonly [string, string]>
): string {
  const body = entries
    .map(([key, value]) => `${JSON.stringify(key)}: ${JSON.stringify(value)}`)
    .join(', ');
  return `{${body}}`;
}

export function shapePageRecord(record: PageRecord): StorageRecord {
  if (typeof record?.id !== 'string' || typeof record?.text !== 'string') {
    throw new ShapeError(
      `Page record must carry string id and text, got id=${typeof record?.id} text=${typeof record?.text}`
    );
  }
  return {
    url: record.id,
    text: record.text,
    metadata: serializeMetadata([
      ['type', 'webpage'],
      ['url', record.id],
    ]),
  };
}
