/**
 * Dependency Planner
 *
 * Orders the agents an Intent requires using a fixed table of data
 * dependencies. Required agents are layered into batches: every agent in a
 * batch depends only on agents in earlier batches, and agents within a batch
 * are sorted by declaration priority. The visiting order is the concatenation
 * of the batches, so sequential and batched dispatch agree on it.
 *
 * The rule table is validated once at construction; a cycle is a deployment
 * defect and raises PlannerConfigurationError.
 */
import { AGENT_IDS, AGENT_PRIORITY, assertNever, type AgentId } from '../agents/types.js';
import type { DependencyRule } from '../config/schema.js';
import type { Intent, PlannerSignals } from '../intent/types.js';
import { PlannerConfigurationError } from '../errors.js';

export type RuleCondition = DependencyRule['when'];

export interface DependencyEdge {
  before: AgentId;
  after: AgentId;
  when: RuleCondition;
}

export interface Plan {
  order: AgentId[];
  batches: AgentId[][];
  edges: DependencyEdge[];
}

export const DEFAULT_DEPENDENCY_RULES: readonly DependencyRule[] = [
  // Prices are only meaningful once we know what is missing
  { agent: 'shopping', after: ['recipe', 'inventory'], when: 'missing_ingredients' },
  { agent: 'health', after: ['recipe'], when: 'nutrition_of_recipe' },
];

export function conditionHolds(when: RuleCondition, signals: PlannerSignals): boolean {
  switch (when) {
    case 'always':
      return true;
    case 'missing_ingredients':
      return signals.missingIngredients;
    case 'nutrition_of_recipe':
      return signals.nutritionOfRecipe;
    default:
      return assertNever(when);
  }
}

export function byPriority(a: AgentId, b: AgentId): number {
  return AGENT_PRIORITY[a] - AGENT_PRIORITY[b];
}

export class DependencyPlanner {
  readonly rules: readonly DependencyRule[];

  constructor(rules: readonly DependencyRule[] = DEFAULT_DEPENDENCY_RULES) {
    this.rules = rules;
    validateRules(rules);
  }

  plan(intent: Pick<Intent, 'requiredAgents' | 'signals'>): Plan {
    const required = [...new Set(intent.requiredAgents)];
    const edges = this.edgesFor(required, intent.signals);

    const remaining = new Set(required);
    const batches: AgentId[][] = [];

    while (remaining.size > 0) {
      const ready = [...remaining]
        .filter((id) => !edges.some((e) => e.after === id && remaining.has(e.before)))
        .sort(byPriority);

      if (ready.length === 0) {
        throw new PlannerConfigurationError(
          `Dependency rules leave ${[...remaining].join(', ')} unorderable`,
          [...remaining]
        );
      }

      for (const id of ready) {
        remaining.delete(id);
      }
      batches.push(ready);
    }

    return { order: batches.flat(), batches, edges };
  }

  private edgesFor(required: AgentId[], signals: PlannerSignals): DependencyEdge[] {
    const edges: DependencyEdge[] = [];

    for (const rule of this.rules) {
      if (!required.includes(rule.agent) || !conditionHolds(rule.when, signals)) {
        continue;
      }
      for (const before of rule.after) {
        const duplicate = edges.some((e) => e.before === before && e.after === rule.agent);
        if (required.includes(before) && !duplicate) {
          edges.push({ before, after: rule.agent, when: rule.when });
        }
      }
    }

    return edges;
  }
}

/**
 * Reject rule tables that could ever produce a cycle, assuming every
 * condition holds at once.
 */
export function validateRules(rules: readonly DependencyRule[]): void {
  const dependsOn = new Map<AgentId, Set<AgentId>>(AGENT_IDS.map((id) => [id, new Set()]));

  for (const rule of rules) {
    for (const before of rule.after) {
      if (before === rule.agent) {
        throw new PlannerConfigurationError(`Agent ${rule.agent} cannot depend on itself`, [
          rule.agent,
        ]);
      }
      dependsOn.get(rule.agent)?.add(before);
    }
  }

  const state = new Map<AgentId, 'visiting' | 'done'>();
  const path: AgentId[] = [];

  const visit = (id: AgentId): void => {
    const mark = state.get(id);
    if (mark === 'done') return;
    if (mark === 'visiting') {
      const cycle = [...path.slice(path.indexOf(id)), id];
      throw new PlannerConfigurationError(`Dependency cycle: ${cycle.join(' → ')}`, cycle);
    }

    state.set(id, 'visiting');
    path.push(id);
    for (const dep of dependsOn.get(id) ?? []) {
      visit(dep);
    }
    path.pop();
    state.set(id, 'done');
  };

  for (const id of AGENT_IDS) {
    visit(id);
  }
}
