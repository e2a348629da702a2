/**
 * Centralized environment variable access to avoid TypeScript index signature errors.
 * Typed getters for process.env that comply with strict TypeScript rules.
 *
 * Only `lib/config.ts` and `lib/logger.ts` should read from here; everything
 * else receives its settings through constructor options.
 */

export const env = {
  /**
   * Get an optional environment variable
   * @param key The environment variable name
   */
  get: (key: string): string | undefined => {
    return process.env[key];
  },

  getOrDefault: (key: string, defaultValue: string): string => {
    return process.env[key] ?? defaultValue;
  },

  isProduction: (): boolean => {
    return process.env['NODE_ENV'] === 'production';
  },

  isTest: (): boolean => {
    return process.env['NODE_ENV'] === 'test';
  },
};
