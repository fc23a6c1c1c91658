/** The node.js environment variable interface */
export interface Env {
  [key: string]: string | undefined;
}

/**
 * Get a string from the environment variable.
 * @throws Error if the variable is not found or empty and no default value was provided.
 */
export const getEnvVariableString = (
  env: Env,
  field: string,
  defaultValue?: string,
): string => {
  const value = env[field];
  if (typeof value !== 'string' || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(
      `The environment variable ${field} must be a non-empty string.`,
    );
  }
  return value;
};

/**
 * Get a number from the environment variable.
 * @throws Error if the variable is not a number or not found and no default value was provided.
 */
export const getEnvVariableNumber = (
  env: Env,
  field: string,
  defaultValue?: number,
): number => {
  const value = env[field];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`The environment variable ${field} must be a number.`);
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`The environment variable ${field} must be a number.`);
  }
  return parsed;
};

/**
 * Get a boolean from the environment variable. The true/1 value return true, false/0 return false. Everything else throws an error.
 * @throws Error if the variable is not a boolean or not found and no default value was provided.
 */
export const getEnvVariableBoolean = (
  env: Env,
  field: string,
  defaultValue?: boolean,
): boolean => {
  const value = env[field]?.toLowerCase();
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`The environment variable ${field} must be a boolean.`);
  }
  if (value === 'true' || value === '1') {
    return true;
  }
  if (value === 'false' || value === '0') {
    return false;
  }
  throw new Error(`The environment variable ${field} must be a boolean.`);
};

export interface SettingDescription {
  constantName: string;
  default: string | number | boolean;
}

/**
 * Shows the available env variables and their default values
 * @param map All the env variables with their default values.
 * @param envPrefix The prefix for the env variables (e.g. "FAILED_EVENT_").
 * @param defaultOverrides Values to print instead of the defaults. The key can be the constant name with or without the prefix.
 * @returns A string with all the ENV config keys and their default values.
 */
export const printConfigSettings = (
  map: SettingDescription[],
  envPrefix: string,
  defaultOverrides?: Record<string, string>,
): string => {
  let result = '';
  for (const s of map) {
    const key = `${envPrefix}${s.constantName}`;
    const value =
      defaultOverrides?.[key] ?? defaultOverrides?.[s.constantName] ?? s.default;
    result += `${key}=${value}\n`;
  }
  return result;
};
