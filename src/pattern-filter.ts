import { InvalidPatternError } from "./errors.ts";

const REGEXP_SPECIAL = /[.*+?^${}()|[\]\\/]/g;

function escapeRegExp(value: string): string {
  return value.replace(REGEXP_SPECIAL, "\\$&");
}

/**
 * Translates a shell-style glob into an anchored, case-insensitive RegExp.
 * Supports `*`, `?` and bracket sets such as `[abc]`, `[0-9]` or `[!x]`. A `]`
 * right after `[` or `[!` belongs to the set; an unclosed `[` is taken
 * literally. Throws `InvalidPatternError` for a set such as `[9-0]`.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = "";

  for (let i = 0; i < pattern.length; i += 1) {
    const char = pattern.charAt(i);

    if (char === "*") {
      source += ".*";
    } else if (char === "?") {
      source += ".";
    } else if (char === "[") {
      const negate = pattern.charAt(i + 1) === "!";
      const bodyStart = i + (negate ? 2 : 1);
      const close = pattern.indexOf("]", bodyStart + 1);
      if (close < 0) {
        source += "\\[";
        continue;
      }
      const body = pattern.slice(bodyStart, close);
      source += `[${negate ? "^" : ""}${body.replace(/[\\\]^]/g, "\\$&")}]`;
      i = close;
    } else {
      source += escapeRegExp(char);
    }
  }

  try {
    return new RegExp(`^${source}$`, "is");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidPatternError(pattern, reason);
  }
}

/** Compiles every pattern, so an invalid one fails before any request is made. */
export function compilePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map(globToRegExp);
}

export function matchesGlob(name: string, pattern: string): boolean {
  return globToRegExp(pattern).test(name);
}

export function shouldInclude(name: string, patterns: readonly string[] = []): boolean {
  if (patterns.length === 0) return true;
  return patterns.some((pattern) => matchesGlob(name, pattern));
}

export interface FilterResult<T> {
  included: T[];
  matched: number;
  filterActive: boolean;
}

export function filterByPatterns<T>(
  items: readonly T[],
  patterns: readonly string[],
  nameOf: (item: T) => string,
): FilterResult<T> {
  const included = items.filter((item) => shouldInclude(nameOf(item), patterns));
  return { included, matched: included.length, filterActive: patterns.length > 0 };
}
