export type EnvSource = Record<string, string | undefined>;

/**
 * Resolve environment variables in strings
 * Supports ${VAR_NAME} and ${VAR_NAME:-default} syntax
 *
 * @param value - String that may contain placeholders
 * @param env - Variable source (defaults to process.env)
 * @returns String with environment variables resolved
 * @throws Error if a variable without default is not set
 */
export function resolveEnv(value: string, env: EnvSource = process.env): string {
  return value.replace(/\$\{([^}:]+)(?::-([^}]*))?\}/g, (_match, varName: string, fallback?: string) => {
    const envValue = env[varName];
    if (envValue !== undefined && envValue !== '') {
      return envValue;
    }
    if (fallback !== undefined) {
      return fallback;
    }
    throw new Error(`Environment variable "${varName}" is not set`);
  });
}

/**
 * Recursively resolve environment variables in every string of a parsed config tree
 */
export function resolveEnvRecursive(value: unknown, env: EnvSource = process.env): unknown {
  if (typeof value === 'string') {
    return resolveEnv(value, env);
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvRecursive(item, env));
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = resolveEnvRecursive(entry, env);
    }
    return result;
  }

  return value;
}
