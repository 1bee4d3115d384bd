import type { LabelSource, TagRole } from '../shared/schema.js';
import { ALL_SCHEMAS } from '../shared/schema.js';

/**
 * Distinct labels declared for `role` across the given record schemas.
 * First-declared order is kept so resolution runs in a stable sequence.
 */
export function collectLabels(role: TagRole, schemas: readonly LabelSource[] = ALL_SCHEMAS): string[] {
  const seen = new Set<string>();
  for (const schema of schemas) {
    const labels = role === 'property'
      ? schema.fields.map(f => f.label)
      : [schema.kind ?? '', ...(schema.references ?? [])];
    for (const label of labels) {
      if (label.length > 0) seen.add(label);
    }
  }
  return [...seen];
}

export function listLabels(schemas: readonly LabelSource[] = ALL_SCHEMAS): { properties: string[]; items: string[] } {
  return {
    properties: collectLabels('property', schemas),
    items: collectLabels('item', schemas),
  };
}
