/**
 * Source Matcher
 *
 * Pairs data sources of both organizations by case-insensitive name.
 * Ids are never compared; they live in unrelated spaces.
 */

import { indexBy, normalizeName, type CommonSource, type DataSource } from '@fieldport/core';

/**
 * Intersect both source lists by normalized name.
 * Keys are lower-cased names, in target order. On duplicate names the last source wins.
 */
export function matchCommonSources(
  sourceSources: readonly DataSource[],
  targetSources: readonly DataSource[]
): Map<string, CommonSource> {
  const sourceByName = indexBy(sourceSources, (source) => normalizeName(source.name));
  const targetByName = indexBy(targetSources, (source) => normalizeName(source.name));

  const common = new Map<string, CommonSource>();
  for (const [name, targetSource] of targetByName) {
    const sourceSource = sourceByName.get(name);
    if (sourceSource) {
      common.set(name, { name, sourceId: sourceSource.id, targetId: targetSource.id });
    }
  }
  return common;
}
