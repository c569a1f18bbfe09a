import { createConfigurationError } from '../../errors.js';

/**
 * Compiles block patterns once, when options are resolved. String patterns
 * are case-insensitive; RegExp instances keep their own flags, minus `g`
 * and `y` so that `test()` never carries state between calls.
 */
export function compileBlockPatterns(patterns: ReadonlyArray<string | RegExp>): RegExp[] {
  return patterns.map((pattern) => {
    if (pattern instanceof RegExp) {
      return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
    }

    try {
      return new RegExp(pattern, 'i');
    } catch (error) {
      throw createConfigurationError(
        `Invalid blocked URL pattern: ${pattern}`,
        { pattern },
        { cause: error },
      );
    }
  });
}

export function findMatchingPattern(url: string, patterns: readonly RegExp[]): RegExp | undefined {
  return patterns.find((pattern) => pattern.test(url));
}
