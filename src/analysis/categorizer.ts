import { readFileSync } from 'fs';
import { z } from 'zod';

import { CATEGORY_VALUES } from '../types.js';
import type { Category, Priority } from '../types.js';

// Resolves to <root>/data from both src/analysis and dist/analysis.
const RULES_PATH = new URL('../../data/categories.json', import.meta.url);

const prioritySchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

const outcomeSchema = z.object({
  category: z.enum(CATEGORY_VALUES),
  summary: z.string(),
  priority: prioritySchema,
});

const ruleSchema = outcomeSchema.extend({
  phrases: z.array(z.string().min(1)),
  /** Text must also contain this literally. */
  requires_text: z.string().optional(),
  /** Any text shorter than this matches regardless of phrases. */
  short_text_below: z.number().int().positive().optional(),
});

const rulesFileSchema = z.object({
  rules: z.array(ruleSchema),
  fallback: outcomeSchema,
});

export type CategoryRule = z.infer<typeof ruleSchema>;
export type CategoryRules = z.infer<typeof rulesFileSchema>;

export interface Categorization {
  category: Category;
  summary: string;
  priority: Priority;
}

let _rules: CategoryRules | null = null;

export function loadCategoryRules(): CategoryRules {
  if (_rules) return _rules;
  const raw: unknown = JSON.parse(readFileSync(RULES_PATH, 'utf-8'));
  _rules = rulesFileSchema.parse(raw);
  return _rules;
}

function matches(rule: CategoryRule, text: string, lower: string): boolean {
  if (rule.requires_text !== undefined && !text.includes(rule.requires_text)) return false;
  if (rule.phrases.some((phrase) => lower.includes(phrase))) return true;
  return rule.short_text_below !== undefined && [...text].length < rule.short_text_below;
}

/**
 * First matching rule wins; rules are ordered from most to least actionable.
 * Phrases are plain case-insensitive substrings.
 */
export function categorizeText(text: string, rules: CategoryRules = loadCategoryRules()): Categorization {
  const lower = text.toLowerCase();
  const rule = rules.rules.find((r) => matches(r, text, lower)) ?? rules.fallback;
  return { category: rule.category, summary: rule.summary, priority: rule.priority };
}
