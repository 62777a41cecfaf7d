import safeRegex from 'safe-regex2'

/** Longest pattern accepted in a filter expression */
export const MAX_PATTERN_LENGTH = 1024

/**
 * Validates that a regex pattern is safe and syntactically valid.
 *
 * @param pattern - The regex pattern to validate.
 * @returns True if the pattern is safe and valid; otherwise, false.
 *
 * @remark Uses safe-regex2 to detect catastrophic backtracking patterns, then
 * compiles the pattern in unicode mode so invalid syntax such as {,5} is
 * rejected.
 */
export function isRegexPatternSafe(pattern: string): boolean {
  const p = pattern.trim()

  if (p.length === 0 || p.length > MAX_PATTERN_LENGTH) {
    return false
  }

  if (!safeRegex(p)) {
    return false
  }

  try {
    new RegExp(p, 'u')
    return true
  } catch {
    return false
  }
}

/**
 * Compiles a filter regex after checking it is safe.
 *
 * @param pattern - The pattern body, without slashes.
 * @param flags - Extra flags; 'u' is always added.
 * @returns The compiled expression, or null if the pattern is unsafe or invalid.
 */
export function compileSafeRegex(
  pattern: string,
  flags = 'i',
): RegExp | null {
  if (!isRegexPatternSafe(pattern)) {
    return null
  }
  const allFlags = flags.includes('u') ? flags : `${flags}u`
  try {
    return new RegExp(pattern, allFlags)
  } catch {
    return null
  }
}
