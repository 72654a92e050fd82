import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

type EnvIssueTarget = {
  path: (string | number)[];
  message: string;
};

function formatIssue({ path, message }: EnvIssueTarget): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

function formatErrorMessage(context: string, issues: EnvIssueTarget[]): string {
  const header = `[${context}] Invalid environment configuration`;
  const details = issues.map((issue) => `  - ${formatIssue(issue)}`).join('\n');
  return `${header}\n${details}`;
}

export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'tabletalk';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message
    }));
    throw new EnvConfigError(formatErrorMessage(context, issues));
  }

  return result.data;
}

function describe(name: string | number | undefined, description?: string): string {
  if (description) {
    return description;
  }
  if (typeof name === 'string' && name.length > 0) {
    return name;
  }
  if (typeof name === 'number') {
    return name.toString();
  }
  return 'value';
}

function isBlank(value: string | undefined | null): value is undefined | null {
  return value === null || value === undefined || value.trim() === '';
}

type DescriptionOption = {
  description?: string;
};

export type BooleanVarOptions = DescriptionOption & {
  defaultValue: boolean;
};

export function booleanVar(options: BooleanVarOptions) {
  return z
    .string()
    .nullable()
    .optional()
    .transform((value, ctx): boolean => {
      if (isBlank(value)) {
        return options.defaultValue;
      }

      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) {
        return true;
      }
      if (FALSE_VALUES.has(normalized)) {
        return false;
      }

      const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
      const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid ${describe(pathName, options.description)}. Accepted boolean values: ${accepted}`
      });
      return z.NEVER;
    });
}

export type IntegerVarOptions = DescriptionOption & {
  defaultValue: number;
  min?: number;
  max?: number;
};

export function integerVar(options: IntegerVarOptions) {
  return z
    .string()
    .nullable()
    .optional()
    .transform((value, ctx): number => {
      const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
      const description = describe(pathName, options.description);

      if (isBlank(value)) {
        return options.defaultValue;
      }

      const trimmed = value.trim();
      const parsed = /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
      if (!Number.isFinite(parsed)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected ${description} to be an integer`
        });
        return z.NEVER;
      }

      if (options.min !== undefined && parsed < options.min) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${description} must be >= ${options.min}`
        });
        return z.NEVER;
      }

      if (options.max !== undefined && parsed > options.max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${description} must be <= ${options.max}`
        });
        return z.NEVER;
      }

      return parsed;
    });
}

export type StringVarOptions = DescriptionOption & {
  defaultValue: string;
  lowercase?: boolean;
};

export function stringVar(options: StringVarOptions) {
  return z
    .string()
    .nullable()
    .optional()
    .transform((value): string => {
      const raw = isBlank(value) ? options.defaultValue : value.trim();
      return options.lowercase ? raw.toLowerCase() : raw;
    });
}

/** Like `stringVar` but yields `null` when the variable is unset or blank. */
export function optionalStringVar() {
  return z
    .string()
    .nullable()
    .optional()
    .transform((value): string | null => (isBlank(value) ? null : value.trim()));
}

export function enumVar<T extends string>(values: readonly [T, ...T[]], options: DescriptionOption & { defaultValue: T }) {
  const allowed = new Set<string>(values);
  return z
    .string()
    .nullable()
    .optional()
    .transform((value, ctx): T => {
      if (isBlank(value)) {
        return options.defaultValue;
      }
      const normalized = value.trim().toLowerCase();
      const match = values.find((entry) => entry === normalized);
      if (match && allowed.has(match)) {
        return match;
      }
      const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid ${describe(pathName, options.description)}. Expected one of: ${values.join(', ')}`
      });
      return z.NEVER;
    });
}

export const portVar = (defaultPort = 3000) =>
  integerVar({
    defaultValue: defaultPort,
    min: 0,
    max: 65535,
    description: 'port'
  });
