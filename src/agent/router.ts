/**
 * Keyword Router
 *
 * Classifies a chat turn to one of a set of agents with an ordered rule
 * table (zero LLM calls). Rules are tried in order and the first match
 * wins; turns that match nothing go to the default agent.
 *
 * @example
 * ```typescript
 * const router = KeywordRouter.fromConfig(config.routing);
 *
 * router.classify('Why was my card charged twice?');
 * // { agent: 'billing', matched: true, keyword: 'charge' }
 *
 * router.classify('Hello there');
 * // { agent: 'triage', matched: false }
 * ```
 */

import type { RoutingConfig } from '../config/index.js';

// ============================================================================
// TYPES
// ============================================================================

export type AgentId = string;

/**
 * Decides whether a turn belongs to a rule's agent.
 *
 * Receives the lowercased turn. Returns the matching keyword (or any
 * non-empty label) when it matches, null otherwise.
 */
export type RoutePredicate = (normalizedText: string) => string | null;

/**
 * One row of the rule table.
 */
export interface RouteRule {
  agent: AgentId;
  predicate: RoutePredicate;
}

/**
 * Result of classification.
 */
export interface RouteDecision {
  agent: AgentId;
  /** False when no rule matched and the default agent was chosen */
  matched: boolean;
  /** What the winning predicate matched on */
  keyword?: string;
}

// ============================================================================
// RULE BUILDERS
// ============================================================================

/**
 * Rule that matches when the turn contains any of `keywords`
 * (case-insensitive substring match, so "bill" also matches "billing").
 */
export function keywordRule(agent: AgentId, keywords: readonly string[]): RouteRule {
  const needles = keywords.map((k) => k.toLowerCase()).filter((k) => k.length > 0);
  return {
    agent,
    predicate: (text) => needles.find((needle) => text.includes(needle)) ?? null,
  };
}

// ============================================================================
// ROUTER
// ============================================================================

export class KeywordRouter {
  constructor(
    private readonly rules: readonly RouteRule[],
    readonly defaultAgent: AgentId
  ) {}

  /**
   * Build a router from the `[routing]` config section.
   */
  static fromConfig(config: RoutingConfig): KeywordRouter {
    return new KeywordRouter(
      config.rules.map((rule) => keywordRule(rule.agent, rule.keywords)),
      config.default_agent
    );
  }

  /** Agents reachable through a rule, in precedence order */
  get agents(): AgentId[] {
    return [...new Set(this.rules.map((rule) => rule.agent))];
  }

  classify(text: string): RouteDecision {
    const normalized = text.toLowerCase();

    for (const rule of this.rules) {
      const keyword = rule.predicate(normalized);
      if (keyword !== null) {
        return { agent: rule.agent, matched: true, keyword };
      }
    }

    return { agent: this.defaultAgent, matched: false };
  }
}
