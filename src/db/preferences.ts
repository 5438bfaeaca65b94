import type { Database } from 'better-sqlite3';
import { z } from 'zod';
import { isKnownLanguage } from '../languages.js';
import type { UserPreference } from '../types.js';
import { AUTO_DETECT, PreferenceValidationError } from '../types.js';
import type { UserPreferenceRow } from './schema.js';

export interface PreferenceStore {
  get(userId: string): Promise<UserPreference | undefined>;
  set(preference: UserPreference): Promise<UserPreference>;
}

const languageCode = z
  .string()
  .min(2)
  .max(5)
  .refine(isKnownLanguage, { message: 'unknown language code' });

export const UserPreferenceSchema = z.object({
  userId: z.string().min(1, 'userId is required'),
  activated: z.boolean(),
  sourceLanguage: languageCode,
  targetLanguage: languageCode.refine((code) => code !== AUTO_DETECT, {
    message: 'target language cannot be auto',
  }),
});

/**
 * Checks an incoming preference record. Throws PreferenceValidationError
 * naming the first invalid field.
 */
export function validatePreference(input: unknown): UserPreference {
  const result = UserPreferenceSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') || 'preference' : 'preference';
    throw new PreferenceValidationError(issue ? `${field}: ${issue.message}` : 'invalid preference', field);
  }
  return result.data;
}

/**
 * SQLite-backed preference store. better-sqlite3 is synchronous; the async
 * signatures keep callers independent of the backing store.
 */
export class PreferenceRepository implements PreferenceStore {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  async get(userId: string): Promise<UserPreference | undefined> {
    const row = this.db
      .prepare<[string], UserPreferenceRow>('SELECT * FROM user_preferences WHERE user_id = ?')
      .get(userId);

    if (!row) {
      return undefined;
    }

    return {
      userId: row.user_id,
      activated: row.activated === 1,
      sourceLanguage: row.source_language,
      targetLanguage: row.target_language,
    };
  }

  async set(preference: UserPreference): Promise<UserPreference> {
    const valid = validatePreference(preference);

    this.db
      .prepare(
        `INSERT INTO user_preferences (user_id, activated, source_language, target_language, updated_at)
         VALUES (@userId, @activated, @sourceLanguage, @targetLanguage, @updatedAt)
         ON CONFLICT(user_id) DO UPDATE SET
           activated = excluded.activated,
           source_language = excluded.source_language,
           target_language = excluded.target_language,
           updated_at = excluded.updated_at`
      )
      .run({
        userId: valid.userId,
        activated: valid.activated ? 1 : 0,
        sourceLanguage: valid.sourceLanguage,
        targetLanguage: valid.targetLanguage,
        updatedAt: Date.now(),
      });

    return valid;
  }
}
