/**
 * Pricing Rule Engine
 *
 * Exports for the pricing rule engine system.
 */

// Types
export * from "./types";

// Multiset
export { ItemMultiset } from "./multiset";

// Rules
export { calculateAdjustment, consumesItems, createRule, requiredMultiset, requiresItem } from "./rule";

// Expression evaluator
export {
  ExpressionEvaluator,
  expressionEvaluator,
  type ReferenceResolver,
} from "./expression-evaluator";

// Rule matcher
export { RuleMatcher, ruleMatcher, type RuleCandidate } from "./rule-matcher";
