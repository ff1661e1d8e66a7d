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

export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const source: EnvSource = { ...(options?.env ?? process.env) };
  const result = schema.safeParse(source);
  if (result.success) {
    return result.data;
  }
  const issues = result.error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${location}: ${issue.message}`;
  });
  throw new EnvConfigError(options?.context ?? 'hcloud', issues);
}

type CommonVarOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

function nameOf(ctx: z.RefinementCtx, description?: string): string {
  if (description) {
    return description;
  }
  const last = ctx.path[ctx.path.length - 1];
  return last === undefined ? 'value' : String(last);
}

function isBlank(value: unknown): value is null | undefined | '' {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Resolves the value of an unset variable: its default, an issue when it is
 * required, or `undefined`.
 */
function resolveUnset<T>(ctx: z.RefinementCtx, options: CommonVarOptions<T> | undefined): T | undefined {
  if (options?.defaultValue !== undefined) {
    return options.defaultValue;
  }
  if (options?.required) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${nameOf(ctx, options.description)}` });
    return z.NEVER;
  }
  return undefined;
}

export type BooleanVarOptions = CommonVarOptions<boolean>;

export function booleanVar(options?: BooleanVarOptions) {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveUnset(ctx, options);
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
      message: `Invalid ${nameOf(ctx, options?.description)}. Accepted boolean values: ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}`
    });
    return z.NEVER;
  });
}

export type IntegerVarOptions = CommonVarOptions<number> & {
  min?: number;
  max?: number;
};

export function integerVar(options?: IntegerVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveUnset(ctx, options);
    }
    const name = nameOf(ctx, options?.description);
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

export type StringVarOptions = CommonVarOptions<string> & {
  pattern?: RegExp;
  lowercase?: boolean;
  oneOf?: readonly string[];
};

export function stringVar(options?: StringVarOptions) {
  return z.string().nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveUnset(ctx, options);
    }
    const name = nameOf(ctx, options?.description);
    const trimmed = value.trim();
    const normalized = options?.lowercase ? trimmed.toLowerCase() : trimmed;
    if (options?.pattern && !options.pattern.test(normalized)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} does not match expected pattern` });
      return z.NEVER;
    }
    if (options?.oneOf && !options.oneOf.includes(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${name} must be one of: ${options.oneOf.join(', ')}`
      });
      return z.NEVER;
    }
    return normalized;
  });
}

export type UrlVarOptions = CommonVarOptions<string> & {
  protocols?: readonly string[];
};

export function urlVar(options?: UrlVarOptions) {
  const protocols = options?.protocols ?? ['http:', 'https:'];
  return stringVar(options).transform((value, ctx) => {
    if (value === undefined) {
      return undefined;
    }
    let url: URL;
    try {
      url = new URL(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${nameOf(ctx, options?.description)} must be a valid URL` });
      return z.NEVER;
    }
    if (!protocols.includes(url.protocol)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${nameOf(ctx, options?.description)} must use one of: ${protocols.join(', ')}`
      });
      return z.NEVER;
    }
    return value.replace(/\/+$/, '');
  });
}
