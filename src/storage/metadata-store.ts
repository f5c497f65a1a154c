/**
 * Metadata Store - flat key/value documents beside the ledger
 *
 * The `meta` document holds replica-level settings (group id, encryption key
 * id). Values replicated through the `prefs` dataset live in their own
 * `prefs` document, so a synced pref can never overwrite a local setting.
 *
 * @module storage/metadata-store
 */

import type { Variant } from '../types/index.js';
import type { KeyValueStore } from './database.js';
import { isVariant } from '../sync/change-record.js';

export const META_DOCUMENT = 'meta';
export const PREFS_DOCUMENT = 'prefs';

export type MetadataDocument = Record<string, Variant>;

export class MetadataStore {
  constructor(
    private readonly kv: KeyValueStore,
    private readonly document: string = META_DOCUMENT
  ) {}

  async read(): Promise<MetadataDocument> {
    const raw = await this.kv.get(this.document);
    if (raw === null) return {};
    const parsed: unknown = JSON.parse(raw);
    const doc: MetadataDocument = {};
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      for (const [key, value] of Object.entries(parsed)) {
        if (isVariant(value)) doc[key] = value;
      }
    }
    return doc;
  }

  async get(key: string): Promise<Variant | undefined> {
    return (await this.read())[key];
  }

  async getString(key: string): Promise<string | null> {
    const value = await this.get(key);
    return typeof value === 'string' && value !== '' ? value : null;
  }

  /**
   * Read-modify-write merge; keys in `patch` overwrite existing ones
   */
  async patch(patch: MetadataDocument): Promise<MetadataDocument> {
    const next = { ...(await this.read()), ...patch };
    await this.kv.put(this.document, JSON.stringify(next));
    return next;
  }
}
