import { z } from 'zod';
import { AlignmentError, ValidationError } from '../errors/AppError.js';

export type FeatureValue = number | string | boolean | null;

export type FeatureRecord = Readonly<Record<string, FeatureValue>>;

export type FeatureVector = readonly number[];

export type NumericField = {
  name: string;
  kind: 'numeric';
};

export type CategoricalField = {
  name: string;
  kind: 'categorical';
  levels: readonly string[];
  reference: string;
};

export type FeatureField = NumericField | CategoricalField;

export type FeatureSchema = {
  fields: readonly FeatureField[];
};

export const featureRecordSchema = z.record(
  z.union([z.number().finite(), z.string(), z.boolean(), z.null()])
);

/**
 * Decodes an untrusted request body into a FeatureRecord. Only a flat JSON
 * object of scalars is accepted.
 */
export function decodeFeatureRecord(body: unknown): FeatureRecord {
  if (body === null || typeof body !== 'object' || Array.isArray(body)) {
    throw new ValidationError('Request body must be a JSON object of feature values');
  }
  const parsed = featureRecordSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError('Feature values must be finite numbers, strings, booleans or null', parsed.error.flatten());
  }
  return Object.freeze(parsed.data);
}

export function indicatorColumn(field: CategoricalField, level: string) {
  return `${field.name}=${level}`;
}

/**
 * Column names of the vector produced by `align`, in vector order.
 */
export function columnsFor(schema: FeatureSchema): string[] {
  const columns: string[] = [];
  for (const field of schema.fields) {
    if (field.kind === 'numeric') {
      columns.push(field.name);
      continue;
    }
    for (const level of field.levels) {
      if (level !== field.reference) {
        columns.push(indicatorColumn(field, level));
      }
    }
  }
  return columns;
}

function readValue(record: FeatureRecord, name: string): FeatureValue | undefined {
  return Object.prototype.hasOwnProperty.call(record, name) ? record[name] : undefined;
}

function alignNumeric(record: FeatureRecord, field: NumericField): number {
  const value = readValue(record, field.name);
  if (value === undefined || value === null) {
    throw new AlignmentError('MissingFeature', field.name, `Missing numeric feature "${field.name}"`);
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`Feature "${field.name}" must be a finite number`, { field: field.name });
  }
  return value;
}

function alignCategorical(record: FeatureRecord, field: CategoricalField): number[] {
  const value = readValue(record, field.name);
  if (value === undefined || value === null) {
    throw new AlignmentError('MissingFeature', field.name, `Missing categorical feature "${field.name}"`);
  }
  if (typeof value !== 'string' || !field.levels.includes(value)) {
    throw new AlignmentError('UnknownCategory', field.name, `Unknown category "${String(value)}" for feature "${field.name}"`, {
      value,
      known_levels: field.levels
    });
  }
  return field.levels
    .filter((level) => level !== field.reference)
    .map((level) => (level === value ? 1 : 0));
}

/**
 * Maps a record onto the fixed-width vector the artifact was trained on.
 * Order comes from the schema only; fields the schema does not know are
 * ignored. Throws before any partial vector escapes.
 */
export function align(record: FeatureRecord, schema: FeatureSchema): FeatureVector {
  const vector: number[] = [];
  for (const field of schema.fields) {
    if (field.kind === 'numeric') {
      vector.push(alignNumeric(record, field));
    } else {
      vector.push(...alignCategorical(record, field));
    }
  }
  return Object.freeze(vector);
}

export type AlignmentResult =
  | { ok: true; vector: FeatureVector }
  | { ok: false; error: AlignmentError | ValidationError };

export function tryAlign(record: FeatureRecord, schema: FeatureSchema): AlignmentResult {
  try {
    return { ok: true, vector: align(record, schema) };
  } catch (error) {
    if (error instanceof AlignmentError || error instanceof ValidationError) {
      return { ok: false, error };
    }
    throw error;
  }
}
