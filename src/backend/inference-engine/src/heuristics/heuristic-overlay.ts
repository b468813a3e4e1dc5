/**
 * Heuristic Overlay
 *
 * Additive logit corrections triggered by substring cues. Runs after the
 * linear scorer and before softmax. Cue matching works on the padded,
 * lowercased raw text (`" " + lower(text) + " "`) without accent stripping:
 * this is a separate normalisation pass from the tokenizer's.
 *
 * A rule fires at most once per call, when any of its cues occurs. Fired
 * rules targeting the same class add up without a cap.
 *
 * @tested tests/property/heuristic-overlay.property.test.ts
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';

import { z } from 'zod';
import {
  ConfigurationError,
  formatIssues,
  type AppliedHeuristic,
} from '@classifier-runtime/shared';

export const HeuristicRuleSchema = z.object({
  id: z.string().min(1).optional(),
  targetClass: z.string().min(1),
  bonus: z.number().finite(),
  cues: z.array(z.string().min(1)).min(1),
});

export type HeuristicRule = z.infer<typeof HeuristicRuleSchema>;

/**
 * Rule tables keyed by classifier identity
 */
export const HeuristicRuleTableSchema = z.record(z.string().min(1), z.array(HeuristicRuleSchema));

export type HeuristicRuleTable = z.infer<typeof HeuristicRuleTableSchema>;

const BUNDLED_RULES_FILE = 'config/heuristic-rules.json';

/**
 * Nearest `config/heuristic-rules.json` in the directory of `from` or any
 * parent. Finds the bundled table from the sources and from a build under
 * `dist/` alike.
 */
export function findBundledRules(from: URL): URL | undefined {
  let dir = new URL('./', from);
  while (!existsSync(new URL(BUNDLED_RULES_FILE, dir))) {
    const parent = new URL('../', dir);
    if (parent.href === dir.href) {
      return undefined;
    }
    dir = parent;
  }
  return new URL(BUNDLED_RULES_FILE, dir);
}

export const DEFAULT_HEURISTICS_PATH =
  findBundledRules(new URL(import.meta.url)) ??
  new URL(`../../../../../${BUNDLED_RULES_FILE}`, import.meta.url);

export interface OverlayResult {
  logits: number[];
  applied: AppliedHeuristic[];
}

export function padText(text: string): string {
  return ` ${text.toLowerCase()} `;
}

export class HeuristicOverlay {
  private readonly rules: readonly HeuristicRule[];

  constructor(rules: readonly HeuristicRule[]) {
    this.rules = rules.map((rule) => ({
      ...rule,
      cues: rule.cues.map((cue) => cue.toLowerCase()),
    }));
  }

  get size(): number {
    return this.rules.length;
  }

  /**
   * Returns a new logit array; the input is not modified
   */
  apply(text: string, logits: readonly number[], classes: readonly string[]): OverlayResult {
    const adjusted = [...logits];
    const applied: AppliedHeuristic[] = [];
    const padded = padText(text);

    this.rules.forEach((rule, ruleIndex) => {
      const classIndex = classes.indexOf(rule.targetClass);
      if (classIndex < 0) {
        return;
      }

      const matchedCue = rule.cues.find((cue) => padded.includes(cue));
      if (matchedCue === undefined) {
        return;
      }

      adjusted[classIndex] += rule.bonus;
      applied.push({
        ruleId: rule.id ?? `${rule.targetClass}#${ruleIndex}`,
        targetClass: rule.targetClass,
        bonus: rule.bonus,
        matchedCue,
      });
    });

    return { logits: adjusted, applied };
  }
}

export function parseHeuristicRuleTable(input: unknown): HeuristicRuleTable {
  const result = HeuristicRuleTableSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid heuristic rule table', formatIssues(result.error.issues));
  }
  return result.data;
}

export async function loadHeuristicRules(
  path: string | URL = DEFAULT_HEURISTICS_PATH
): Promise<HeuristicRuleTable> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read heuristic rules from ${String(path)}`, [], {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Heuristic rules at ${String(path)} are not valid JSON`, [], {
      cause: error,
    });
  }

  return parseHeuristicRuleTable(parsed);
}

/**
 * Overlay for one classifier, or undefined when its table defines no rules
 */
export function overlayFor(
  table: HeuristicRuleTable,
  classifierId: string
): HeuristicOverlay | undefined {
  const rules = table[classifierId];
  return rules && rules.length > 0 ? new HeuristicOverlay(rules) : undefined;
}
