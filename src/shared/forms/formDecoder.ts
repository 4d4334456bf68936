/**
 * Form Decoder
 *
 * Decodes url-encoded form values into a typed object with a Zod schema.
 * Forms routinely carry fields the schema does not describe (CSRF tokens,
 * submit button names), so unknown-field issues are dropped. Every other
 * issue (missing field, wrong type, failed refinement) is reported, even
 * when it arrives together with unknown-field issues.
 */
import { z } from 'zod';
import { BadRequestError } from '../errors/AppError.js';

// ============================================
// TYPES
// ============================================

/**
 * Raw form values as produced by the body and query string parsers
 */
export type FormValues = Record<string, unknown>;

export interface FieldIssue {
  field: string;
  message: string;
}

/**
 * Decoding failure with the remaining (non unknown-field) issues
 */
export class FormDecodeError extends BadRequestError {
  public readonly issues: z.ZodIssue[];
  public readonly fields: FieldIssue[];

  constructor(issues: z.ZodIssue[]) {
    const fields = issues.map(toFieldIssue);
    super(`Form decoding failed: ${formatFields(fields)}`);
    this.issues = issues;
    this.fields = fields;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), fields: this.fields };
  }
}

export type DecodeResult<T> = { data: T; error?: undefined } | { data?: undefined; error: BadRequestError };

// ============================================
// ISSUE FILTERING
// ============================================

const UNKNOWN_FIELD_ISSUE = z.ZodIssueCode.unrecognized_keys;

export function isUnknownFieldIssue(issue: z.ZodIssue): boolean {
  return issue.code === UNKNOWN_FIELD_ISSUE;
}

/**
 * Keep only the issues that are real decoding errors
 */
export function withoutUnknownFieldIssues(issues: z.ZodIssue[]): z.ZodIssue[] {
  return issues.filter((issue) => !isUnknownFieldIssue(issue));
}

function toFieldIssue(issue: z.ZodIssue): FieldIssue {
  return { field: issue.path.map(String).join('.'), message: issue.message };
}

function formatFields(fields: FieldIssue[]): string {
  return fields
    .map(({ field, message }) => (field ? `${field}: ${message}` : message))
    .join(', ');
}

// ============================================
// DECODING
// ============================================

export type FormOutput<Shape extends z.ZodRawShape> = z.infer<z.ZodObject<Shape, 'strip'>>;

/**
 * Decode form values. The schema is checked in strict mode so unknown
 * fields show up as their own issue kind and can be filtered out by kind.
 *
 * When unknown fields were the only problem, the values are decoded again
 * under the schema's own unknown-key policy: a `.passthrough()` schema keeps
 * them, a `.strict()` or default schema drops them.
 */
export function decodeForm<Shape extends z.ZodRawShape>(
  values: FormValues,
  schema: z.ZodObject<Shape>
): DecodeResult<FormOutput<Shape>> {
  const result = schema.strict().safeParse(values);

  if (result.success) {
    return { data: result.data };
  }

  const issues = withoutUnknownFieldIssues(result.error.issues);
  if (issues.length > 0) {
    return { error: new FormDecodeError(issues) };
  }

  // Only unknown fields were wrong. A strict schema would reject them again.
  const lenient: z.ZodObject<Shape> =
    schema._def.unknownKeys === 'strict' ? schema.strip() : schema;
  const retry = lenient.safeParse(values);
  if (retry.success) {
    return { data: retry.data };
  }
  return { error: new FormDecodeError(retry.error.issues) };
}

/**
 * Validate an already parsed JSON body. No issue is filtered: the schema
 * decides whether unknown keys are allowed.
 */
export function decodeJson<T>(body: unknown, schema: z.ZodType<T>): DecodeResult<T> {
  if (body === undefined || body === null) {
    return { error: new BadRequestError('Request body is empty') };
  }

  const result = schema.safeParse(body);
  if (result.success) {
    return { data: result.data };
  }
  return { error: new FormDecodeError(result.error.issues) };
}
