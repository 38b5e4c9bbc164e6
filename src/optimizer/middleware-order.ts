/**
 * Middleware ordering by measured cost.
 *
 * A stage is fixed when it is pinned, may short-circuit the pipeline,
 * declares a dependency, or is depended upon. Fixed stages keep their
 * declared slot. The remaining (commutable) stages are sorted by ascending
 * average cost, stable on declaration order, and written back into the slots
 * commutable stages occupied. Which stages run, and where a short-circuit can
 * stop the pipeline, is therefore unchanged.
 */

import type { MiddlewareCostProfile } from '../metrics/types.js';

export interface MiddlewareStageSpec {
  name: string;
  /** Stages that must run before this one */
  dependsOn?: readonly string[];
  /** The stage may end the pipeline early (auth, rate limiting, ...) */
  shortCircuits?: boolean;
  /** Never move this stage */
  pinned?: boolean;
}

export interface OrderPlan {
  order: string[];
  fixed: string[];
  commutable: string[];
  /** Why the declared order was kept, when it was */
  reason?: string;
}

export function fixedStages(stages: readonly MiddlewareStageSpec[]): Set<string> {
  const fixed = new Set<string>();
  for (const stage of stages) {
    const dependencies = stage.dependsOn ?? [];
    if (stage.pinned || stage.shortCircuits || dependencies.length > 0) {
      fixed.add(stage.name);
    }
    for (const dependency of dependencies) {
      fixed.add(dependency);
    }
  }
  return fixed;
}

export function planMiddlewareOrder(
  stages: readonly MiddlewareStageSpec[],
  profiles: readonly MiddlewareCostProfile[]
): OrderPlan {
  const declared = stages.map(stage => stage.name);
  const fixed = fixedStages(stages);
  const costByName = new Map(profiles.map(profile => [profile.name, profile]));

  const slots: number[] = [];
  const commutable: Array<{ name: string; index: number; cost: number }> = [];
  let unmeasured: string | undefined;

  for (const [index, stage] of stages.entries()) {
    if (fixed.has(stage.name)) continue;
    const profile = costByName.get(stage.name);
    if (!profile || profile.calls === 0) {
      unmeasured ??= stage.name;
    }
    slots.push(index);
    commutable.push({ name: stage.name, index, cost: profile?.avgCostMs ?? 0 });
  }

  const fixedNames = declared.filter(name => fixed.has(name));
  const commutableNames = commutable.map(stage => stage.name);

  if (commutable.length < 2) {
    return { order: declared, fixed: fixedNames, commutable: commutableNames, reason: 'fewer than two commutable stages' };
  }
  if (unmeasured !== undefined) {
    return { order: declared, fixed: fixedNames, commutable: commutableNames, reason: `no cost samples for "${unmeasured}"` };
  }

  const sorted = [...commutable].sort((a, b) => a.cost - b.cost || a.index - b.index);
  const order = [...declared];
  slots.forEach((slot, i) => {
    const stage = sorted[i];
    if (stage) order[slot] = stage.name;
  });

  return { order, fixed: fixedNames, commutable: commutableNames };
}
