import { z } from 'zod';

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'EnvConfigError';
    this.issues = issues;
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

/**
 * Parses an environment bag against a zod object schema. Every failing variable is
 * reported at once so an operator can fix a broken deployment in one pass.
 */
export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'orchestrator';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      formatIssue({ path: issue.path, message: issue.message })
    );
    const details = issues.map((issue) => `  - ${issue}`).join('\n');
    throw new EnvConfigError(`[${context}] Invalid environment configuration\n${details}`, issues);
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

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

type RequiredOption = {
  required?: boolean;
};

type DefaultOption<T> = {
  defaultValue?: T;
};

type DescriptionOption = {
  description?: string;
};

export type IntegerVarOptions = RequiredOption &
  DefaultOption<number> &
  DescriptionOption & {
    min?: number;
    max?: number;
  };

export function integerVar(options?: IntegerVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);

    if (value === null || value === undefined || isBlank(value)) {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    const parsed = typeof value === 'number' ? Math.trunc(value) : Number(value.trim());
    if (!Number.isInteger(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${description} to be an integer`
      });
      return z.NEVER;
    }

    if (options?.min !== undefined && parsed < options.min) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} must be >= ${options.min}`
      });
      return z.NEVER;
    }

    if (options?.max !== undefined && parsed > options.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} must be <= ${options.max}`
      });
      return z.NEVER;
    }

    return parsed;
  });
}

export type StringVarOptions = RequiredOption &
  DefaultOption<string> &
  DescriptionOption & {
    lowercase?: boolean;
    allowed?: readonly string[];
  };

export function stringVar(options?: StringVarOptions) {
  return z.string().optional().transform((value, ctx) => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);

    const trimmed = value?.trim();
    if (trimmed === undefined || trimmed.length === 0) {
      if (options?.defaultValue !== undefined) {
        return options.lowercase ? options.defaultValue.toLowerCase() : options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    const normalized = options?.lowercase ? trimmed.toLowerCase() : trimmed;

    if (options?.allowed && !options.allowed.includes(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} must be one of ${options.allowed.join(', ')}`
      });
      return z.NEVER;
    }

    return normalized;
  });
}

export function urlVar(options?: RequiredOption & DefaultOption<string> & DescriptionOption) {
  return stringVar(options).transform((value, ctx) => {
    if (value === undefined) {
      return undefined;
    }
    try {
      const parsed = new URL(value);
      if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        throw new Error('unsupported protocol');
      }
    } catch {
      const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${describe(pathName, options?.description)} must be an http(s) URL`
      });
      return z.NEVER;
    }
    return value.replace(/\/+$/, '');
  });
}
