/**
 * Category profile registry
 *
 * Profiles are plain data (data/profiles.json). They are parsed, checked for
 * consistency against the assessor table and frozen once; a bad profile is a
 * load-time ConfigurationError, never a per-request failure.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { CategoryIdSchema, CategoryProfileSchema } from './schema.js';
import type { CategoryId, CategoryProfile } from './schema.js';
import { lookupAssessor } from './formulas.js';
import { ConfigurationError, InvalidCategoryError } from './errors.js';

const WEIGHT_SUM_TOLERANCE = 1e-6;

const PROFILES_PATH = fileURLToPath(new URL('../data/profiles.json', import.meta.url));

export interface CategoryRegistry {
  profile(id: string): CategoryProfile;
  categoryIds(): readonly CategoryId[];
}

// ============================================================================
// Consistency Checks
// ============================================================================

function validateProfile(profile: CategoryProfile): string[] {
  const problems: string[] = [];
  const weights = Object.entries(profile.componentWeights);

  const sum = weights.reduce((acc, [, w]) => acc + w, 0);
  if (Math.abs(sum - 1.0) > WEIGHT_SUM_TOLERANCE) {
    problems.push(`component weights sum to ${sum}, expected 1.0`);
  }

  for (const [name] of weights) {
    const assessor = lookupAssessor(name);
    if (!assessor) {
      problems.push(`component '${name}' has no assessor`);
      continue;
    }
    for (const requirement of assessor.requires) {
      if (profile[requirement] === undefined) {
        problems.push(`component '${name}' requires '${requirement}'`);
      }
    }
  }

  if (!(profile.gating.component in profile.componentWeights)) {
    problems.push(`gating component '${profile.gating.component}' is not weighted`);
  }

  return problems;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

// ============================================================================
// Registry
// ============================================================================

/**
 * Build a registry from raw profile data keyed by category id.
 */
export function createRegistry(raw: unknown): CategoryRegistry {
  const parsed = CategoryProfileSchema.array().safeParse(
    raw !== null && typeof raw === 'object' ? Object.values(raw) : raw
  );
  if (!parsed.success) {
    throw new ConfigurationError('Category profiles failed schema validation', parsed.error.issues);
  }

  const profiles = new Map<CategoryId, CategoryProfile>();
  for (const profile of parsed.data) {
    if (profiles.has(profile.id)) {
      throw new ConfigurationError(`Duplicate category profile '${profile.id}'`);
    }
    const problems = validateProfile(profile);
    if (problems.length > 0) {
      throw new ConfigurationError(`Category profile '${profile.id}' is inconsistent`, problems);
    }
    profiles.set(profile.id, deepFreeze(profile));
  }

  const ids = Object.freeze([...profiles.keys()]);

  return Object.freeze({
    profile(id: string): CategoryProfile {
      const known = CategoryIdSchema.safeParse(id);
      const found = known.success ? profiles.get(known.data) : undefined;
      if (!found) {
        throw new InvalidCategoryError(id, ids);
      }
      return found;
    },
    categoryIds(): readonly CategoryId[] {
      return ids;
    },
  });
}

export function loadRegistry(path: string = PROFILES_PATH): CategoryRegistry {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Unable to read category profiles from ${path}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return createRegistry(raw);
}

/** Process-wide registry, built once at import. */
export const registry: CategoryRegistry = loadRegistry();

export function profile(id: string): CategoryProfile {
  return registry.profile(id);
}
