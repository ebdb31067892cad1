/**
 * Invalidation Rules
 * @module services/cache-engine/invalidation-rules
 *
 * Rules attached to operations at configuration time, describing what to
 * invalidate when a table changes. The engine does not store rules; call
 * sites apply them and the relation graph derived from them feeds related
 * invalidation.
 */

import { z } from 'zod';
import { parseConfigSection } from './config.js';
import { ICacheInvalidator, InvalidationResult, StoreOperationOptions } from './interfaces.js';

// ============================================================================
// Types
// ============================================================================

export enum InvalidationRuleType {
  ALL = 'All',
  PATTERN = 'Pattern',
  RELATED = 'Related',
}

export const InvalidationRuleSchema = z
  .object({
    tableName: z.string().min(1),
    invalidationType: z.nativeEnum(InvalidationRuleType).default(InvalidationRuleType.ALL),
    pattern: z.string().min(1).optional(),
    relatedTables: z.array(z.string().min(1)).default([]),
    /** Omitted means the configured default depth */
    maxDepth: z.number().int().min(1).optional(),
  })
  .refine(rule => rule.invalidationType !== InvalidationRuleType.PATTERN || rule.pattern !== undefined, {
    message: 'Pattern rules require a pattern',
    path: ['pattern'],
  });

export type InvalidationRule = z.infer<typeof InvalidationRuleSchema>;
export type InvalidationRuleInput = z.input<typeof InvalidationRuleSchema>;

// ============================================================================
// Rule Helpers
// ============================================================================

/**
 * Validate rule input and fill defaults
 */
export function createInvalidationRule(input: InvalidationRuleInput): InvalidationRule {
  return parseConfigSection(InvalidationRuleSchema, input, 'invalidation rule');
}

/**
 * Apply a rule through any invalidator (local tracker or broadcaster)
 */
export async function applyInvalidationRule(
  invalidator: ICacheInvalidator,
  rule: InvalidationRule,
  options?: StoreOperationOptions
): Promise<InvalidationResult> {
  switch (rule.invalidationType) {
    case InvalidationRuleType.ALL:
      return invalidator.invalidate(rule.tableName, options);
    case InvalidationRuleType.PATTERN:
      // Validated rules always carry a pattern here; fall back to the table otherwise
      return rule.pattern !== undefined
        ? invalidator.invalidateByPattern(rule.pattern, options)
        : invalidator.invalidate(rule.tableName, options);
    case InvalidationRuleType.RELATED:
      return invalidator.invalidateWithRelated(rule.tableName, rule.relatedTables, rule.maxDepth, options);
  }
}

/**
 * Table -> related tables, merged across every rule naming the table
 */
export function buildRelationGraph(rules: readonly InvalidationRule[]): Map<string, string[]> {
  const graph = new Map<string, string[]>();

  for (const rule of rules) {
    if (rule.relatedTables.length === 0) {
      continue;
    }
    const related = graph.get(rule.tableName) ?? [];
    for (const table of rule.relatedTables) {
      if (!related.includes(table)) {
        related.push(table);
      }
    }
    graph.set(rule.tableName, related);
  }

  return graph;
}
