/**
 * Field schemas for the three record kinds.
 *
 * Zod is the single authority for field validation:
 * - every field is required and non-empty after trimming, except the
 *   optional address lines and state, which default to ""
 * - stored strings are trimmed
 * - unknown fields (including `id` and `kind`) are rejected
 *
 * Postal codes and phone numbers are free text; only presence is checked.
 */

import { z } from 'zod';
import type { RecordFields } from '../types/records.js';
import type { ValidationIssue } from '../types/common.js';
import { ValidationError } from '../store/errors.js';

/**
 * ISO date with optional minutes-or-seconds time part.
 */
export const FLIGHT_DATE_PATTERN =
  /^\d{4}-(0[1-9]|1[0-2])-(0[1-9]|[12]\d|3[01])(T([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?)?$/;

function requiredText(label: string) {
  return z
    .string({
      required_error: `${label} is required`,
      invalid_type_error: `${label} must be a string`,
    })
    .trim()
    .min(1, `${label} must not be empty`);
}

function optionalText(label: string) {
  return z
    .string({ invalid_type_error: `${label} must be a string` })
    .trim()
    .default('');
}

function recordReference(label: string) {
  return z
    .number({
      required_error: `${label} is required`,
      invalid_type_error: `${label} must be a number`,
    })
    .int(`${label} must be an integer`)
    .positive(`${label} must be positive`);
}

export const clientFieldsSchema: z.ZodType<RecordFields<'Client'>, z.ZodTypeDef, unknown> = z
  .object({
    name: requiredText('Name'),
    addressLine1: requiredText('Address line 1'),
    addressLine2: optionalText('Address line 2'),
    addressLine3: optionalText('Address line 3'),
    city: requiredText('City'),
    state: optionalText('State'),
    postalCode: requiredText('Postal code'),
    country: requiredText('Country'),
    phoneNumber: requiredText('Phone number'),
  })
  .strict();

export const airlineFieldsSchema: z.ZodType<RecordFields<'Airline'>, z.ZodTypeDef, unknown> = z
  .object({
    companyName: requiredText('Company name'),
  })
  .strict();

export const flightFieldsSchema: z.ZodType<RecordFields<'Flight'>, z.ZodTypeDef, unknown> = z
  .object({
    clientId: recordReference('Client id'),
    airlineId: recordReference('Airline id'),
    date: requiredText('Date').regex(
      FLIGHT_DATE_PATTERN,
      'Date must be YYYY-MM-DD, optionally followed by THH:mm or THH:mm:ss'
    ),
    origin: requiredText('Origin'),
    destination: requiredText('Destination'),
  })
  .strict();

/**
 * Convert zod issues to our ValidationIssue format.
 * Unknown keys are reported one issue per key.
 */
export function convertZodIssues(issues: z.ZodIssue[]): ValidationIssue[] {
  const out: ValidationIssue[] = [];
  for (const issue of issues) {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      for (const key of issue.keys) {
        out.push({ path: key, message: `Unknown field: ${key}` });
      }
      continue;
    }
    out.push({
      path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
      message: issue.message,
    });
  }
  return out;
}

/**
 * Parse a field set, throwing ValidationError on failure.
 */
export function parseFields<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(convertZodIssues(result.error.issues));
  }
  return result.data;
}
