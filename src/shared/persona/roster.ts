import rosterSeed from './roster.seed.json';
import type { PersonaSeed } from './types';

const PERSONA_ROLES = new Set(['lead', 'anxious', 'skeptic', 'dreamer']);

function cloneSeed(seed: PersonaSeed): PersonaSeed {
  return {
    ...seed,
    traits: { ...seed.traits },
    dynamics: { ...seed.dynamics },
    typing: { ...seed.typing },
    phobias: [...seed.phobias],
    hesitationPhrases: [...seed.hesitationPhrases],
    catchphrases: [...seed.catchphrases],
    preferredIntents: { ...seed.preferredIntents },
    keywordBonuses: { ...seed.keywordBonuses },
    fallbackLines: [...seed.fallbackLines]
  };
}

function isPersonaSeed(value: unknown): value is PersonaSeed {
  if (!value || typeof value !== 'object') {
    return false;
  }
  return (
    'name' in value &&
    typeof value.name === 'string' &&
    'role' in value &&
    typeof value.role === 'string' &&
    PERSONA_ROLES.has(value.role) &&
    'traits' in value &&
    typeof value.traits === 'object' &&
    'dynamics' in value &&
    typeof value.dynamics === 'object' &&
    'typing' in value &&
    typeof value.typing === 'object' &&
    'fallbackLines' in value &&
    Array.isArray(value.fallbackLines) &&
    value.fallbackLines.length > 0
  );
}

const RAW_ROSTERS: Record<string, unknown[]> = rosterSeed;

const ROSTERS: Record<string, PersonaSeed[]> = Object.fromEntries(
  Object.entries(RAW_ROSTERS).map(([variantId, seeds]) => {
    if (!seeds.every(isPersonaSeed)) {
      throw new Error(`[roster] roster.seed.json variant "${variantId}" is malformed`);
    }
    return [variantId, seeds.map((seed) => cloneSeed(seed))];
  })
);

export const DEFAULT_ROSTER_VARIANT = 'core-four';

export function getPersonaSeedsForVariant(variantId: string): PersonaSeed[] {
  const roster = ROSTERS[variantId] ?? ROSTERS[DEFAULT_ROSTER_VARIANT] ?? [];
  return roster.map(cloneSeed);
}

export function listRosterVariants(): string[] {
  return Object.keys(ROSTERS);
}
