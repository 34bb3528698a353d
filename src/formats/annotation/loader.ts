/**
 * Two-column annotation tables (profile id -> KO code or gene symbol)
 *
 * Format: one pair per line, key and value separated by the first run of
 * whitespace; the value may contain spaces. `#` lines and blank lines are
 * ignored. Annotation files are optional inputs, so a missing or unreadable
 * file degrades to an empty map instead of failing the run.
 */

import { pathExists, readToString } from "../../io/file-reader";
import type { AnnotationLoaderOptions, AnnotationMap } from "../../types";

/**
 * Placeholder written when a profile has no annotation
 */
export const MISSING_ANNOTATION = "NA";

const PAIR_PATTERN = /^(\S+)\s+(.+)$/;

/**
 * Parse annotation text into a map; later duplicate keys override earlier ones
 *
 * @example
 * ```typescript
 * const map = parseAnnotationText("PF00001\tK00001\nPF00002 dehydrogenase E1\n");
 * map.get("PF00002"); // "dehydrogenase E1"
 * ```
 */
export function parseAnnotationText(text: string): AnnotationMap {
  const map = new Map<string, string>();

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#")) continue;

    const match = PAIR_PATTERN.exec(line);
    if (match === null) continue;

    const [, key, value] = match;
    if (key !== undefined && value !== undefined) {
      map.set(key, value);
    }
  }

  return map;
}

/**
 * Load an annotation file
 *
 * - `path` undefined or nothing at that path: empty map, silently
 * - the path exists but cannot be read (a directory, no permission):
 *   empty map plus one warning
 */
export async function loadAnnotationMap(
  path: string | undefined,
  options: AnnotationLoaderOptions = {}
): Promise<AnnotationMap> {
  const onWarning = options.onWarning ?? ((warning: string): void => console.warn(warning));
  const label = options.label ?? "annotation";

  if (path === undefined || path === "") {
    return new Map();
  }

  try {
    if (!(await pathExists(path))) {
      return new Map();
    }
    return parseAnnotationText(await readToString(path));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    onWarning(`Warning: could not read ${label} file: ${path} (${reason})`);
    return new Map();
  }
}

/**
 * Look up a profile id, falling back to `MISSING_ANNOTATION`
 */
export function lookupAnnotation(map: AnnotationMap, key: string): string {
  return map.get(key) ?? MISSING_ANNOTATION;
}
