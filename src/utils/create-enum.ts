import { z } from 'zod';

/**
 * Helper to create enum-like object with Zod schema
 * - Creates object with uppercase keys: AUDIO -> 'audio'
 * - Creates Zod schema for validation
 * - Infers TypeScript type as string literals
 * - Provides a type guard for values coming from untyped sources
 *
 * @example
 * ```ts
 * const mediaType = createEnum(['video', 'audio'] as const);
 *
 * // mediaType.object.AUDIO === 'audio'
 * // mediaType.schema - Zod schema
 * // typeof mediaType.type === 'video' | 'audio'
 * // mediaType.is('audio') === true
 * ```
 */
export function createEnum<const T extends readonly [string, ...string[]]>(values: T) {
  const obj = Object.fromEntries(values.map((v) => [v.toUpperCase(), v])) as { [K in T[number] as Uppercase<K>]: K };
  const allowed: ReadonlySet<string> = new Set(values);

  return {
    values,
    object: obj,
    schema: z.enum(values),
    type: null as unknown as T[number],
    is: (value: unknown): value is T[number] => typeof value === 'string' && allowed.has(value),
  };
}
