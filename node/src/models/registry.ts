/**
 * Model Registry: maps user-facing model names to Open-Meteo model ids.
 * Built once at startup and frozen; shared read-only across requests.
 */

import type { ModelKey } from '@/types/forecast';
import { UnknownModelError } from '@/services/errors';

export interface ModelEntry {
  name: ModelKey;
  providerId: string;
}

/** Models the bot offers out of the box. */
export const DEFAULT_MODELS: readonly ModelEntry[] = [
  { name: 'GFS', providerId: 'gfs_seamless' },
  { name: 'ICON', providerId: 'icon_seamless' },
  { name: 'ECMWF', providerId: 'ecmwf_ifs025' },
  { name: 'JMA', providerId: 'jma_seamless' },
  { name: 'GEM', providerId: 'gem_seamless' },
  { name: 'UKMO', providerId: 'ukmo_seamless' },
  { name: 'MeteoFrance', providerId: 'meteofrance_seamless' },
  { name: 'ACCESS-G', providerId: 'bom_access_global' },
];

export interface ModelSelection {
  known: ModelKey[];
  unknown: string[];
}

export interface ModelRegistry {
  resolve(name: ModelKey): string;
  listNames(): readonly ModelKey[];
  /** Trims tokens, drops blanks and duplicates, splits into known / unknown. */
  selectKnown(tokens: readonly string[]): ModelSelection;
}

export function createModelRegistry(entries: readonly ModelEntry[] = DEFAULT_MODELS): ModelRegistry {
  const byName = new Map<ModelKey, string>();
  for (const entry of entries) {
    if (byName.has(entry.name)) {
      throw new Error(`Duplicate model name in registry: ${entry.name}`);
    }
    byName.set(entry.name, entry.providerId);
  }
  const names = Object.freeze([...byName.keys()]);

  return Object.freeze({
    resolve(name: ModelKey): string {
      const providerId = byName.get(name);
      if (providerId === undefined) throw new UnknownModelError(name);
      return providerId;
    },

    listNames(): readonly ModelKey[] {
      return names;
    },

    selectKnown(tokens: readonly string[]): ModelSelection {
      const known: ModelKey[] = [];
      const unknown: string[] = [];
      for (const raw of tokens) {
        const token = raw.trim();
        if (!token) continue;
        if (!byName.has(token)) {
          unknown.push(token);
        } else if (!known.includes(token)) {
          known.push(token);
        }
      }
      return { known, unknown };
    },
  });
}
