/**
 * Validation and cleanup of extraction candidates returned by a completion
 *
 * The model is asked for strict JSON but nothing guarantees it, so every
 * field is checked here before anything reaches the graph store.
 */

import {
  isEntityType,
  isRelationshipType,
  type Entity,
  type Relationship,
  type ExtractionResult
} from '../core/types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(item: Record<string, unknown>, key: string): string {
  const value = item[key];
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * Keep the first occurrence of each non-empty name; unknown types become 'concept'
 */
export function sanitizeEntities(candidates: unknown): Entity[] {
  if (!Array.isArray(candidates)) {
    return [];
  }

  const cleaned: Entity[] = [];
  const seen = new Set<string>();

  for (const candidate of candidates) {
    if (!isRecord(candidate)) continue;

    const name = stringField(candidate, 'name');
    if (!name || seen.has(name)) continue;

    const type = (stringField(candidate, 'type') || 'concept').toLowerCase();

    cleaned.push({ name, type: isEntityType(type) ? type : 'concept' });
    seen.add(name);
  }

  return cleaned;
}

/**
 * Drop self-loops, empty endpoints and unknown types; dedupe on (from, type, to)
 */
export function sanitizeRelationships(candidates: unknown): Relationship[] {
  if (!Array.isArray(candidates)) {
    return [];
  }

  const cleaned: Relationship[] = [];
  const seen = new Set<string>();

  for (const candidate of candidates) {
    if (!isRecord(candidate)) continue;

    const from = stringField(candidate, 'from');
    const to = stringField(candidate, 'to');
    const type = (stringField(candidate, 'type') || 'part_of').toLowerCase();

    if (!from || !to || from === to) continue;
    if (!isRelationshipType(type)) continue;

    const key = `${from}|${type}|${to}`;
    if (seen.has(key)) continue;

    cleaned.push({ from, to, type });
    seen.add(key);
  }

  return cleaned;
}

/**
 * Sanitize a parsed completion payload of shape { entities, relationships }
 */
export function sanitizeExtraction(payload: unknown): ExtractionResult {
  if (!isRecord(payload)) {
    return { entities: [], relationships: [] };
  }

  return {
    entities: sanitizeEntities(payload.entities),
    relationships: sanitizeRelationships(payload.relationships)
  };
}
