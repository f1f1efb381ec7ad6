export class EnvParseError extends Error {
  constructor(
    public readonly variable: string,
    message: string
  ) {
    super(message);
    this.name = 'EnvParseError';
  }
}

type Env = Record<string, string | undefined>;

const TRUE_VALUES = ['true', '1', 'yes'];
const FALSE_VALUES = ['false', '0', 'no'];

export interface EnvReader {
  readRequiredString(name: string): string;
  readOptionalString(name: string): string | undefined;
  readOptionalString(name: string, fallback: string): string;
  readOptionalBool(name: string, fallback: boolean): boolean;
  readOptionalNumber(name: string, fallback: number): number;
}

/**
 * Typed access to a flat environment map. Blank values are treated as unset.
 */
export const createEnvReader = (env: Env): EnvReader => {
  const read = (name: string) => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  function readOptionalString(name: string): string | undefined;
  function readOptionalString(name: string, fallback: string): string;
  function readOptionalString(name: string, fallback?: string) {
    return read(name) ?? fallback;
  }

  return {
    readRequiredString(name) {
      const value = read(name);
      if (value === undefined) {
        throw new EnvParseError(name, `Missing required environment variable ${name}`);
      }
      return value;
    },

    readOptionalString,

    readOptionalBool(name, fallback) {
      const value = read(name);
      if (value === undefined) {
        return fallback;
      }
      const normalized = value.toLowerCase();
      if (TRUE_VALUES.includes(normalized)) {
        return true;
      }
      if (FALSE_VALUES.includes(normalized)) {
        return false;
      }
      throw new EnvParseError(name, `${name} must be a boolean, got "${value}"`);
    },

    readOptionalNumber(name, fallback) {
      const value = read(name);
      if (value === undefined) {
        return fallback;
      }
      const parsed = Number(value);
      if (Number.isNaN(parsed)) {
        throw new EnvParseError(name, `${name} must be a number, got "${value}"`);
      }
      return parsed;
    },
  };
};
