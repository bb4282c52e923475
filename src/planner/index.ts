export {
  DependencyPlanner,
  DEFAULT_DEPENDENCY_RULES,
  byPriority,
  conditionHolds,
  validateRules,
  type DependencyEdge,
  type Plan,
  type RuleCondition,
} from './planner.js';
