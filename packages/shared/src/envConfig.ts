import { z } from 'zod';

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  readonly issues: string[];

  constructor(context: string, issues: string[]) {
    super([`[${context}] Invalid environment configuration`, ...issues.map((issue) => `  - ${issue}`)].join('\n'));
    this.name = 'EnvConfigError';
    this.issues = issues;
  }
}

/**
 * Parses `env` (defaults to `process.env`) with the given schema. All failing variables are
 * reported together in a single {@link EnvConfigError}.
 */
export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const source: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'thermobridge';

  const result = schema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
      return `${location}: ${issue.message}`;
    });
    throw new EnvConfigError(context, issues);
  }
  return result.data;
}

type BaseVarOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

function variableName(ctx: z.RefinementCtx, description?: string): string {
  if (description) {
    return description;
  }
  const last = ctx.path[ctx.path.length - 1];
  return last === undefined ? 'value' : String(last);
}

function isBlank(value: unknown): value is null | undefined | '' {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

// Shared handling for unset variables: default, required issue, or undefined.
function resolveMissing<T>(ctx: z.RefinementCtx, options: BaseVarOptions<T> | undefined): T | undefined {
  if (options?.defaultValue !== undefined) {
    return options.defaultValue;
  }
  if (options?.required) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${variableName(ctx, options.description)}` });
    return z.NEVER;
  }
  return undefined;
}

export type BooleanVarOptions = BaseVarOptions<boolean>;

export function booleanVar(options?: BooleanVarOptions) {
  return z
    .union([z.string(), z.boolean()])
    .nullable()
    .optional()
    .transform((value, ctx): boolean | undefined => {
      if (isBlank(value)) {
        return resolveMissing(ctx, options);
      }
      if (typeof value === 'boolean') {
        return value;
      }
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.includes(normalized)) {
        return true;
      }
      if (FALSE_VALUES.includes(normalized)) {
        return false;
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid ${variableName(ctx, options?.description)}. Accepted boolean values: ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}`
      });
      return z.NEVER;
    });
}

export type IntegerVarOptions = BaseVarOptions<number> & {
  min?: number;
  max?: number;
};

export function integerVar(options?: IntegerVarOptions) {
  return z
    .union([z.string(), z.number()])
    .nullable()
    .optional()
    .transform((value, ctx): number | undefined => {
      if (isBlank(value)) {
        return resolveMissing(ctx, options);
      }
      const name = variableName(ctx, options?.description);
      const parsed = typeof value === 'number' ? Math.trunc(value) : Number(value.trim());
      if (!Number.isInteger(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected ${name} to be an integer` });
        return z.NEVER;
      }
      if (options?.min !== undefined && parsed < options.min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be >= ${options.min}` });
        return z.NEVER;
      }
      if (options?.max !== undefined && parsed > options.max) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be <= ${options.max}` });
        return z.NEVER;
      }
      return parsed;
    });
}

export type StringVarOptions = BaseVarOptions<string> & {
  pattern?: RegExp;
};

export function stringVar(options?: StringVarOptions) {
  return z
    .string()
    .nullable()
    .optional()
    .transform((value, ctx): string | undefined => {
      if (isBlank(value)) {
        return resolveMissing(ctx, options);
      }
      const trimmed = value.trim();
      if (options?.pattern && !options.pattern.test(trimmed)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${variableName(ctx, options.description)} does not match expected pattern`
        });
        return z.NEVER;
      }
      return trimmed;
    });
}

export type JsonVarOptions<T> = BaseVarOptions<T> & {
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
};

export function jsonVar<T>(options: JsonVarOptions<T>) {
  return z
    .string()
    .nullable()
    .optional()
    .transform((value, ctx): T | undefined => {
      if (isBlank(value)) {
        return resolveMissing(ctx, options);
      }
      const name = variableName(ctx, options.description);
      let parsed: unknown;
      try {
        parsed = JSON.parse(value);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Failed to parse ${name} as JSON` });
        return z.NEVER;
      }
      const result = options.schema.safeParse(parsed);
      if (!result.success) {
        const [firstIssue] = result.error.issues;
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${name} ${firstIssue?.message ?? 'does not match expected structure'}`
        });
        return z.NEVER;
      }
      return result.data;
    });
}

export const portVar = (defaultPort: number) =>
  integerVar({ defaultValue: defaultPort, min: 1, max: 65535, description: 'port' });
