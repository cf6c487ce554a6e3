import type { MappingConfig, SourceSpec } from '../config/mapping-config';
import type { NormalizedRow, RawRecord } from '../database/types';
import { MissingFieldError } from '../utils/errors';

// undefined, null and '' all count as "not supplied"
function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Apply every field mapping of a source to one raw record.
 *
 * Absent required fields throw MissingFieldError. Absent optional fields are
 * left out of the row, so the sink writes NULL for that column.
 */
export function resolveWithSpec(spec: SourceSpec, record: RawRecord): NormalizedRow {
  const row: NormalizedRow = {};

  for (const field of spec.fields) {
    const value = record[field.rawField];
    if (isAbsent(value)) {
      if (field.required) throw new MissingFieldError(field.rawField, spec.name);
      continue;
    }
    row[field.column] = field.clean(value, field.args);
  }

  return row;
}

export function resolveRecord(config: MappingConfig, source: string, record: RawRecord): NormalizedRow {
  return resolveWithSpec(config.getSource(source), record);
}
