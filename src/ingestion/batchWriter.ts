import { WriteError, errorMessage } from '../lib/errors';
import type { CollectionHandle, StorageRecord } from './types';

/**
 * Adds every record to one batch on `collection`, in order. The batch is
 * closed exactly once whether or not an add fails; failures surface as
 * `WriteError` after the close.
 */
export async function writeAll(
  collection: CollectionHandle,
  records: StorageRecord[]
): Promise<number> {
  const batch = collection.openBatch();
  let written = 0;
  let addError: unknown;
  try {
    for (const record of records) {
      await batch.add(record);
      written += 1;
    }
  } catch (error) {
    addError = error;
  }

  try {
    await batch.close();
  } catch (closeError) {
    if (addError === undefined) {
      throw asWriteError(collection.name, closeError);
    }
    throw asWriteError(
      collection.name,
      addError,
      new AggregateError([addError, closeError], 'batch add and close failed')
    );
  }

  if (addError !== undefined) {
    throw asWriteError(collection.name, addError);
  }
  return written;
}

function asWriteError(
  collection: string,
  error: unknown,
  cause: unknown = error
): WriteError {
  if (error instanceof WriteError && cause === error) return error;
  return new WriteError(
    `Write to collection ${collection} failed: ${errorMessage(error)}`,
    { cause }
  );
}
