/**
 * Duplicate key (E11000) handling. Unique indexes guard idempotent inserts,
 * so a duplicate is an outcome for the caller to branch on.
 */

import type { Collection, Document, OptionalUnlessRequiredId, ClientSession } from 'mongodb';
import { logger } from './logger.js';

/** Matches driver errors, server replies and wrapped messages */
export function isDuplicateKeyError(error: unknown): boolean {
  if (!error || typeof error !== 'object') return false;

  if ('code' in error && (error.code === 11000 || error.code === 11001)) return true;
  if ('codeName' in error && error.codeName === 'DuplicateKey') return true;

  const message = 'message' in error && typeof error.message === 'string' ? error.message : '';
  return message.includes('duplicate key') || message.includes('E11000') || message.includes('E11001');
}

/**
 * @returns false when a unique index already holds an equivalent document
 */
export async function insertIgnoringDuplicate<T extends Document>(
  collection: Collection<T>,
  doc: OptionalUnlessRequiredId<T>,
  session?: ClientSession
): Promise<boolean> {
  try {
    await collection.insertOne(doc, session ? { session } : undefined);
    return true;
  } catch (error) {
    if (isDuplicateKeyError(error)) {
      logger.debug('Duplicate key ignored', { collection: collection.collectionName });
      return false;
    }
    throw error;
  }
}
