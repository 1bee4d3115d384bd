import type { PropertyPayload, PropertyValue, SyncRecord, TagMaps } from '../shared/types.js';
import type { FieldSpec, RecordSchema } from '../shared/schema.js';
import { SchemaMismatchError } from './errors.js';

export function propertyIdFor(maps: TagMaps, label: string): string {
  const id = maps.properties.get(label);
  if (id === undefined) {
    throw new SchemaMismatchError(`No property id resolved for label "${label}"`);
  }
  return id;
}

export function itemIdFor(maps: TagMaps, label: string): string {
  const id = maps.items.get(label);
  if (id === undefined) {
    throw new SchemaMismatchError(`No item id resolved for label "${label}"`);
  }
  return id;
}

/** Fill the instance-only field from the record's kind */
export function classify(record: SyncRecord, maps: TagMaps): void {
  record.instanceOf = itemIdFor(maps, record.kind);
}

function toPropertyValue<T>(schema: RecordSchema<T>, field: FieldSpec<T>, raw: unknown): PropertyValue | undefined {
  const where = `${schema.kind}.${field.key}`;
  switch (field.value) {
    case 'string':
      if (typeof raw !== 'string') {
        throw new SchemaMismatchError(`${where} must be a string, got ${typeof raw}`);
      }
      return raw === '' ? undefined : { type: 'string', value: raw };
    case 'item':
      if (typeof raw !== 'string') {
        throw new SchemaMismatchError(`${where} must be an item id, got ${typeof raw}`);
      }
      return raw === '' ? undefined : { type: 'item', id: raw };
    case 'quantity':
      if (typeof raw !== 'number' || !Number.isFinite(raw)) {
        throw new SchemaMismatchError(`${where} must be a finite number, got ${String(raw)}`);
      }
      return { type: 'quantity', value: raw };
  }
}

/**
 * Build the property payload for `record`.
 *
 * Absent and empty fields are left out: they are not known yet. Restrict the
 * payload to some fields with `only`.
 */
export function translateFields<T>(
  record: T,
  schema: RecordSchema<T>,
  maps: TagMaps,
  only?: readonly (keyof T & string)[],
): PropertyPayload {
  const payload: PropertyPayload = {};
  for (const field of schema.fields) {
    if (only && !only.includes(field.key)) continue;
    const raw: unknown = record[field.key];
    if (raw === undefined) continue;
    const value = toPropertyValue(schema, field, raw);
    if (value === undefined) continue;
    payload[propertyIdFor(maps, field.label)] = value;
  }
  return payload;
}
