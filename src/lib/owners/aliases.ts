/**
 * Alias expansion for OWNERS entries
 *
 * entries: [a, b, c], aliases: { a: [d, e, f], b: [e, g] } -> [c, d, e, f, g]
 */

import type { AliasTable } from './types.js';
import { comparePaths } from './paths.js';

/**
 * Replace every alias in entries with its members
 *
 * Entries that are not aliases are kept verbatim; null or empty entries are
 * dropped. An alias with no members (null) contributes nothing and is
 * reported through onEmptyAlias. The result is deduplicated and sorted.
 */
export function expandAliases(
  entries: ReadonlyArray<string | null | undefined> | null | undefined,
  aliases: AliasTable | null | undefined,
  onEmptyAlias?: (alias: string) => void
): string[] {
  const expanded = new Set<string>();
  const table = aliases ?? {};

  for (const entry of entries ?? []) {
    if (entry === null || entry === undefined || entry === '') {
      continue;
    }

    if (Object.prototype.hasOwnProperty.call(table, entry)) {
      const members = table[entry];
      if (members === null || members === undefined) {
        onEmptyAlias?.(entry);
        continue;
      }
      for (const member of members) {
        if (member) {
          expanded.add(member);
        }
      }
      continue;
    }

    expanded.add(entry);
  }

  return [...expanded].sort(comparePaths);
}
