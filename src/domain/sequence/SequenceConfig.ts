import { z } from 'zod';
import { SequenceConfig, SequenceConfigInput } from '../../types';
import { ConfigError } from '../common/Errors';

export const DEFAULT_ORDER_FIELD = 'order';
export const DEFAULT_START_AT = 0;

// Stores key records by this field
export const RECORD_ID_FIELD = 'id';

// Plain identifiers only: field names end up in store queries unescaped
const fieldNameSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Field name must start with a letter or underscore and contain only letters, digits and underscores');

const sequenceConfigObjectSchema = z.object({
  orderField: fieldNameSchema.optional(),
  groupFields: z.union([fieldNameSchema, z.array(fieldNameSchema), z.literal(false)]).optional(),
  startAt: z.number().int().optional(),
}).strict();

/**
 * Validate settings of unknown shape (e.g. parsed from a file).
 * @throws {ConfigError} on invalid field names, duplicate group fields, use
 * of the record ID field, or when the order field is also a group field
 */
export function parseSequenceConfig(input: unknown): SequenceConfig {
  const parsed = typeof input === 'string'
    ? fieldNameSchema.transform(orderField => ({ orderField })).safeParse(input)
    : sequenceConfigObjectSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid sequence config: ${issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')}`,
      issues
    );
  }

  const settings: z.infer<typeof sequenceConfigObjectSchema> = parsed.data;
  const orderField = settings.orderField ?? DEFAULT_ORDER_FIELD;

  let groupFields: string[] = [];
  if (typeof settings.groupFields === 'string') {
    groupFields = [settings.groupFields];
  } else if (Array.isArray(settings.groupFields)) {
    groupFields = settings.groupFields;
  }

  const duplicates = groupFields.filter((field, index) => groupFields.indexOf(field) !== index);
  if (duplicates.length > 0) {
    throw new ConfigError(`Group field listed more than once: ${duplicates.join(', ')}`);
  }

  if (orderField === RECORD_ID_FIELD || groupFields.includes(RECORD_ID_FIELD)) {
    throw new ConfigError(`'${RECORD_ID_FIELD}' is the record identity and cannot be sequenced or grouped on`);
  }

  if (groupFields.includes(orderField)) {
    throw new ConfigError(`Order field '${orderField}' cannot also be a group field`);
  }

  return Object.freeze({
    orderField,
    groupFields: Object.freeze([...groupFields]),
    startAt: settings.startAt ?? DEFAULT_START_AT,
  });
}

/**
 * Resolve settings into an immutable SequenceConfig. A bare string names the
 * order field.
 */
export function resolveSequenceConfig(input: SequenceConfigInput = {}): SequenceConfig {
  return parseSequenceConfig(input);
}
