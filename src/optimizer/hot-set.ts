/**
 * Hot-set selection.
 *
 * Candidates are ranked by heat score, highest first. Ties go to the route
 * with the lower tenure in the hot set (routes not yet in it have tenure 0),
 * so emerging routes are not starved by incumbents with the same score. A
 * remaining tie is broken by route id, ascending. The first `capacity`
 * routes form the new hot set; an incumbent that falls outside is demoted in
 * the same pass, so there is never a moment with two entries for one route
 * or more than `capacity` entries.
 */

import type { RouteId } from '../metrics/types.js';
import type { HotSetEntry } from './types.js';

export interface HotSetCandidate {
  route: RouteId;
  score: number;
}

export interface HotSetSelection {
  entries: HotSetEntry[];
  promoted: RouteId[];
  demoted: RouteId[];
}

export function tenure(entry: HotSetEntry | undefined, cycle: number): number {
  return entry ? cycle - entry.promotedAtCycle : 0;
}

export function compareCandidates(
  a: HotSetCandidate,
  b: HotSetCandidate,
  current: ReadonlyMap<RouteId, HotSetEntry>,
  cycle: number
): number {
  if (a.score !== b.score) return b.score - a.score;
  const tenureDiff = tenure(current.get(a.route), cycle) - tenure(current.get(b.route), cycle);
  if (tenureDiff !== 0) return tenureDiff;
  return a.route < b.route ? -1 : a.route > b.route ? 1 : 0;
}

export function selectHotSet(
  candidates: readonly HotSetCandidate[],
  previous: readonly HotSetEntry[],
  capacity: number,
  cycle: number
): HotSetSelection {
  const current = new Map(previous.map(entry => [entry.route, entry]));
  const ranked = candidates
    .filter(candidate => Number.isFinite(candidate.score))
    .sort((a, b) => compareCandidates(a, b, current, cycle))
    .slice(0, capacity);

  const promoted: RouteId[] = [];
  const entries = ranked.map((candidate): HotSetEntry => {
    const existing = current.get(candidate.route);
    if (existing) {
      return Object.freeze({ ...existing, score: candidate.score });
    }
    promoted.push(candidate.route);
    return Object.freeze({
      route: candidate.route,
      promotedAtCycle: cycle,
      scoreAtPromotion: candidate.score,
      score: candidate.score,
    });
  });

  const kept = new Set(entries.map(entry => entry.route));
  const demoted = previous.map(entry => entry.route).filter(route => !kept.has(route));

  return { entries, promoted, demoted };
}
