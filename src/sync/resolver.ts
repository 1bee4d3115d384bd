import type { TagMaps } from '../shared/types.js';
import type { TagRole } from '../shared/schema.js';
import type { KnowledgeStoreClient } from './store-client.js';
import { LabelResolutionError } from './errors.js';
import { collectLabels } from './registry.js';

/**
 * Look up each label in turn. The first failure aborts the pass: later labels
 * are not requested and no partial map escapes.
 */
async function resolveLabels(
  role: TagRole,
  labels: Iterable<string>,
  lookup: (label: string) => Promise<string>,
): Promise<Map<string, string>> {
  const resolved = new Map<string, string>();
  for (const label of labels) {
    let id: string;
    try {
      id = await lookup(label);
    } catch (err) {
      throw new LabelResolutionError(role, label, err);
    }
    resolved.set(label, id);
  }
  return resolved;
}

export function resolvePropertyLabels(client: KnowledgeStoreClient, labels: Iterable<string>): Promise<Map<string, string>> {
  return resolveLabels('property', labels, label => client.resolvePropertyLabel(label));
}

export function resolveItemLabels(client: KnowledgeStoreClient, labels: Iterable<string>): Promise<Map<string, string>> {
  return resolveLabels('item', labels, label => client.resolveItemLabel(label));
}

/** Resolve every label the record schemas declare, properties first */
export async function resolveTagMaps(client: KnowledgeStoreClient): Promise<TagMaps> {
  const properties = await resolvePropertyLabels(client, collectLabels('property'));
  const items = await resolveItemLabels(client, collectLabels('item'));
  return { properties, items };
}
