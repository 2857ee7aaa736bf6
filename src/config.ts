/**
 * Function inputs
 *
 * The user-facing options of a checking run, validated with zod. Values come
 * from the caller first, then from environment variables (a `.env` file is
 * loaded when present).
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors';

loadDotenv();

const capitalize = (value: unknown): unknown =>
  typeof value === 'string'
    ? value.trim().charAt(0).toUpperCase() + value.trim().slice(1).toLowerCase()
    : value;

const lowercase = (value: unknown): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

export const asBoolean = (value: unknown): unknown => {
  if (typeof value !== 'string') return value;
  const lower = value.trim().toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') return true;
  if (lower === 'false' || lower === '0' || lower === 'no' || lower === '') return false;
  return value;
};

export const functionInputsSchema = z.object({
  spreadsheetUrl: z.string().trim().min(1, 'A rule spreadsheet URL is required'),
  minimumSeverity: z.preprocess(capitalize, z.enum(['Info', 'Warning', 'Error'])).default('Info'),
  hideSkipped: z.preprocess(asBoolean, z.boolean()).default(false),
  propertyMatchMode: z.preprocess(lowercase, z.enum(['strict', 'fuzzy', 'mixed'])).default('strict'),
  logLevel: z.preprocess(lowercase, z.enum(['debug', 'info', 'warn', 'error'])).default('info'),
});

export type FunctionInputs = z.infer<typeof functionInputsSchema>;

export type FunctionInputsOverrides = { [K in keyof FunctionInputs]?: unknown };

/**
 * @throws ConfigurationError listing every invalid field
 */
export function parseFunctionInputs(input: unknown): FunctionInputs {
  const result = functionInputsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid function inputs',
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Merge explicit overrides over environment values, then validate
 */
export function loadFunctionInputs(
  overrides: FunctionInputsOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): FunctionInputs {
  const fromEnv: FunctionInputsOverrides = {
    spreadsheetUrl: env.RULES_SPREADSHEET_URL,
    minimumSeverity: env.MINIMUM_SEVERITY,
    hideSkipped: env.HIDE_SKIPPED,
    propertyMatchMode: env.PROPERTY_MATCH_MODE,
    logLevel: env.LOG_LEVEL,
  };

  const merged: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fromEnv)) {
    if (value !== undefined && value !== '') merged[key] = value;
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  return parseFunctionInputs(merged);
}
