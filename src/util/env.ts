/**
 * Environment utilities for stage detection and safe env var access.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function getStage(): string {
  // Explicit APP_STAGE/STAGE wins; derive from NODE_ENV otherwise
  const explicit = process.env.APP_STAGE || process.env.STAGE;
  if (explicit && explicit.length > 0) return explicit;
  const nodeEnv = getNodeEnv();
  if (nodeEnv === "production") return "prod";
  if (nodeEnv === "test") return "test";
  return "dev";
}

export function isProduction(): boolean {
  const stage = getStage();
  return stage === "prod" || getNodeEnv() === "production";
}

export function isTest(): boolean {
  return getNodeEnv() === "test" || process.env.JEST_WORKER_ID !== undefined;
}

export interface GetEnvVarOptions<T> {
  defaultValue?: T;
  required?: boolean;
  parse?: (raw: string) => T;
  stageAware?: boolean; // if true, prefer NAME__<stage> before NAME
}

function readRaw(name: string, stageAware: boolean): string | undefined {
  const stageKey = `${name}__${getStage()}`;
  const candidate = stageAware
    ? process.env[stageKey] ?? process.env[name]
    : process.env[name];
  return candidate != null && candidate !== "" ? candidate : undefined;
}

/**
 * Reads an environment variable with fallbacks and optional parsing.
 * - If `stageAware` is true (default), checks NAME__<stage> first (e.g., HF_TOKEN__prod), then NAME.
 * - If not found, returns `defaultValue` when provided; otherwise throws when `required` is true.
 */
export function getEnvVar<T>(
  name: string,
  options: GetEnvVarOptions<T> & { parse: (raw: string) => T }
): T | undefined;
export function getEnvVar(
  name: string,
  options?: GetEnvVarOptions<string>
): string | undefined;
export function getEnvVar<T>(
  name: string,
  options: GetEnvVarOptions<T> = {}
): T | string | undefined {
  const stageAware = options.stageAware !== false;
  const candidate = readRaw(name, stageAware);

  if (candidate !== undefined) {
    return options.parse ? options.parse(candidate) : candidate;
  }

  if (options.defaultValue !== undefined) {
    return options.defaultValue;
  }

  if (options.required) {
    const tried = stageAware ? `${name}__${getStage()} or ${name}` : name;
    throw new Error(`Missing required env var: ${tried}`);
  }

  return undefined;
}

export function getRequiredString(name: string): string {
  const value = getEnvVar(name, { required: true });
  if (value === undefined) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
}

export function getString(name: string, defaultValue: string): string;
export function getString(name: string): string | undefined;
export function getString(
  name: string,
  defaultValue?: string
): string | undefined {
  return getEnvVar(name, { defaultValue });
}

export function getNumber(name: string, defaultValue: number): number;
export function getNumber(name: string): number | undefined;
export function getNumber(
  name: string,
  defaultValue?: number
): number | undefined {
  return getEnvVar<number>(name, {
    defaultValue,
    parse: raw => {
      const n = Number(raw);
      if (Number.isNaN(n))
        throw new Error(`Env var ${name} is not a number: ${raw}`);
      return n;
    },
  });
}

export function getBoolean(name: string, defaultValue: boolean): boolean;
export function getBoolean(name: string): boolean | undefined;
export function getBoolean(
  name: string,
  defaultValue?: boolean
): boolean | undefined {
  return getEnvVar<boolean>(name, {
    defaultValue,
    parse: raw => {
      const lowered = raw.toLowerCase();
      if (["1", "true", "yes", "y"].includes(lowered)) return true;
      if (["0", "false", "no", "n"].includes(lowered)) return false;
      throw new Error(`Env var ${name} is not a boolean: ${raw}`);
    },
  });
}

/**
 * Splits a comma/pipe separated env value into trimmed, non-empty parts.
 */
export function getList(name: string, defaultValue: string[]): string[] {
  const raw = getEnvVar(name);
  if (raw === undefined) return defaultValue;
  const parts = raw
    .split(/[,|]/)
    .map(part => part.trim())
    .filter(part => part.length > 0);
  return parts.length > 0 ? parts : defaultValue;
}
