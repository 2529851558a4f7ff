/**
 * Zod schemas for request configuration and validation options.
 *
 * Every public entry point that takes configuration funnels it through
 * `parseConfig`, so invalid input fails at one place with one error code.
 */

import { z } from 'zod';
import { DEFAULTS } from './constants.js';
import { ErrorCodes, HawkError } from './errors.js';

/** Header field value: anything except the `"` delimiter */
export const fieldValueSchema = z
  .string()
  .refine((value) => !value.includes('"'), 'Must not contain a double quote');

export const portSchema = z
  .number()
  .int('Port must be an integer')
  .min(0, 'Port must be at least 0')
  .max(65535, 'Port cannot exceed 65535');

/** Unix time in seconds; fractions are allowed and truncated by consumers */
export const secondsSchema = z.number().finite('Timestamp must be finite');

export const requestConfigSchema = z.object({
  method: z.string().min(1, 'Method is required'),
  host: z.string().min(1, 'Host is required'),
  port: portSchema,
  path: z.string(),
  hash: z.instanceof(Uint8Array).optional(),
  ext: fieldValueSchema.optional(),
  app: fieldValueSchema.optional(),
  dlg: fieldValueSchema.optional(),
});

export type RequestConfig = z.input<typeof requestConfigSchema>;

export const validationOptionsSchema = z.object({
  now: secondsSchema.optional(),
  skewSeconds: z
    .number()
    .finite()
    .nonnegative('Skew must not be negative')
    .default(DEFAULTS.skewSeconds),
});

export const requestStateOptionsSchema = z.object({
  now: secondsSchema.optional(),
  nonceBytes: z
    .number()
    .int()
    .min(DEFAULTS.minNonceBytes, `Nonce must carry at least ${DEFAULTS.minNonceBytes} bytes`)
    .default(DEFAULTS.nonceBytes),
});

/**
 * Validate `input` against `schema`.
 *
 * @throws HawkError E_INVALID_REQUEST listing every issue
 */
export function parseConfig<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  what: string
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new HawkError(ErrorCodes.INVALID_REQUEST, `Invalid ${what}: ${issues}`);
  }
  return result.data;
}

/**
 * Current Unix time in whole seconds.
 */
export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Drop the sub-second part of a timestamp.
 */
export function toSeconds(ts: number): number {
  return Math.trunc(ts);
}
