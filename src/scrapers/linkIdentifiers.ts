/**
 * linkIdentifiers.ts — Pull tariff identifiers out of export link targets.
 *
 * Export links carry the record id as `tid=<digits>` somewhere in their
 * `href` (or, for postback-driven links, their `onclick`).  Only positive
 * integers in the safe range count; `tid=0` or an overflowing run of digits
 * is ignored.
 */

import type { TariffId } from '../core/types';

const TID_PATTERN = /\btid=(\d+)/gi;

/** Every identifier present in one link target, in order of appearance. */
export function parseTariffIds(target: string | null | undefined): TariffId[] {
  if (!target) return [];

  const ids: TariffId[] = [];
  for (const match of target.matchAll(TID_PATTERN)) {
    const value = Number(match[1]);
    if (Number.isSafeInteger(value) && value > 0) {
      ids.push(value);
    }
  }
  return ids;
}

/** The exact set of identifiers across `targets`; order and repeats do not matter. */
export function collectTariffIds(
  targets: Iterable<string | null | undefined>,
): Set<TariffId> {
  const ids = new Set<TariffId>();
  for (const target of targets) {
    for (const id of parseTariffIds(target)) {
      ids.add(id);
    }
  }
  return ids;
}
