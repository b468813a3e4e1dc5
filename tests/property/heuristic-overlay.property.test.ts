/**
 * Property 4: Additive Heuristic Overlay
 *
 * For any base logits and any text, the adjusted logit of each class SHALL
 * equal its base logit plus the bonuses of the rules that fired for it, and
 * SHALL equal the base logit exactly when no rule fired.
 *
 * @file src/backend/inference-engine/src/heuristics/heuristic-overlay.ts
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import { ConfigurationError } from '../../src/backend/shared/src/index.js';
import {
  DEFAULT_HEURISTICS_PATH,
  HeuristicOverlay,
  findBundledRules,
  loadHeuristicRules,
  overlayFor,
  padText,
  parseHeuristicRuleTable,
  type HeuristicRule,
} from '../../src/backend/inference-engine/src/heuristics/heuristic-overlay.js';

// Property test configuration
const propertyConfig = {
  numRuns: 100,
  verbose: false,
};

const classes = ['simple', 'complex', 'multistep'];

const infrastructureRule: HeuristicRule = {
  id: 'infrastructure-terms',
  targetClass: 'complex',
  bonus: 1.5,
  cues: ['deploy', 'docker'],
};

const connectiveRule: HeuristicRule = {
  id: 'multistep-connectives',
  targetClass: 'multistep',
  bonus: 1.0,
  cues: [' then ', ' after '],
};

const logitsArb = fc.array(fc.double({ min: -20, max: 20, noNaN: true }), {
  minLength: classes.length,
  maxLength: classes.length,
});

// Words that contain none of the cues above
const neutralWordArb = fc.constantFrom('fix', 'typo', 'rename', 'variable', 'readme', 'and', 'the');

const neutralTextArb = fc.array(neutralWordArb, { maxLength: 8 }).map((words) => words.join(' '));

describe('Property 4: Additive Heuristic Overlay', () => {
  const overlay = new HeuristicOverlay([infrastructureRule, connectiveRule]);

  it('should leave logits unchanged when no cue occurs', () => {
    fc.assert(
      fc.property(logitsArb, neutralTextArb, (logits, text) => {
        const result = overlay.apply(text, logits, classes);

        expect(result.logits).toEqual(logits);
        expect(result.logits).not.toBe(logits);
        expect(result.applied).toEqual([]);
      }),
      propertyConfig
    );
  });

  it('should add exactly the bonus of a fired rule to its class', () => {
    fc.assert(
      fc.property(logitsArb, neutralTextArb, neutralTextArb, (logits, before, after) => {
        const result = overlay.apply(`${before} deploy ${after}`, logits, classes);

        expect(result.logits).toEqual([logits[0], logits[1] + 1.5, logits[2]]);
        expect(result.applied).toEqual([
          { ruleId: 'infrastructure-terms', targetClass: 'complex', bonus: 1.5, matchedCue: 'deploy' },
        ]);
      }),
      propertyConfig
    );
  });

  it('should not modify the input logits', () => {
    fc.assert(
      fc.property(logitsArb, (logits) => {
        const snapshot = [...logits];
        overlay.apply('deploy then docker', logits, classes);
        expect(logits).toEqual(snapshot);
      }),
      propertyConfig
    );
  });

  it('should fire a rule once however many of its cues occur', () => {
    const result = overlay.apply('deploy docker', [0, 0, 0], classes);

    expect(result.logits).toEqual([0, 1.5, 0]);
    expect(result.applied).toHaveLength(1);
    expect(result.applied[0].matchedCue).toBe('deploy');
  });

  it('should accumulate fired rules that target the same class', () => {
    const stacked = new HeuristicOverlay([
      { targetClass: 'complex', bonus: 1.5, cues: ['deploy'] },
      { targetClass: 'complex', bonus: 0.5, cues: ['docker'] },
    ]);

    const result = stacked.apply('deploy docker', [0, 0, 0], classes);

    expect(result.logits).toEqual([0, 2, 0]);
    expect(result.applied.map((rule) => rule.ruleId)).toEqual(['complex#0', 'complex#1']);
  });

  it('should apply rules for different classes independently', () => {
    const result = overlay.apply('Deploy then restart', [0.25, 0, 0], classes);

    expect(result.logits).toEqual([0.25, 1.5, 1]);
    expect(result.applied.map((rule) => rule.targetClass)).toEqual(['complex', 'multistep']);
  });

  it('should match cues case-insensitively against the padded text', () => {
    expect(padText('Then Deploy')).toBe(' then deploy ');
    expect(overlay.apply('Then DEPLOY', [0, 0, 0], classes).logits).toEqual([0, 1.5, 1]);

    const upperCue = new HeuristicOverlay([{ targetClass: 'simple', bonus: 2, cues: ['TYPO'] }]);
    expect(upperCue.apply('fix typo', [0, 0, 0], classes).logits).toEqual([2, 0, 0]);
  });

  it('should respect word boundaries encoded in padded cues', () => {
    expect(overlay.apply('strengthen the walls', [0, 0, 0], classes).applied).toEqual([]);
  });

  it('should match cues without stripping accents', () => {
    const accentRule = new HeuristicOverlay([{ targetClass: 'simple', bonus: 1, cues: ['cafe'] }]);
    expect(accentRule.apply('café menu', [0, 0, 0], classes).applied).toEqual([]);
  });

  it('should skip rules whose class the model does not have', () => {
    const foreign = new HeuristicOverlay([{ targetClass: 'review', bonus: 3, cues: ['fix'] }]);
    expect(foreign.apply('fix typo', [1, 2, 3], classes).logits).toEqual([1, 2, 3]);
  });

  describe('rule tables', () => {
    it('should load the bundled rule table', async () => {
      const table = await loadHeuristicRules();
      const complexity = overlayFor(table, 'complexity');

      expect(table.complexity.map((rule) => rule.id)).toEqual([
        'multistep-connectives',
        'infrastructure-terms',
      ]);
      expect(complexity?.size).toBe(2);
      expect(overlayFor(table, 'intent')).toBeUndefined();
    });

    it('should point the default path at the bundled table', () => {
      expect(DEFAULT_HEURISTICS_PATH.href).toBe(new URL('../../config/heuristic-rules.json', import.meta.url).href);
    });

    it('should find the bundled table from a compiled module under dist', async () => {
      const root = await mkdtemp(join(tmpdir(), 'classifier-build-'));
      try {
        const moduleDir = join(root, 'dist', 'src', 'backend', 'inference-engine', 'src', 'heuristics');
        await mkdir(moduleDir, { recursive: true });
        await mkdir(join(root, 'config'));
        await writeFile(join(root, 'config', 'heuristic-rules.json'), '{}');

        const found = findBundledRules(pathToFileURL(join(moduleDir, 'heuristic-overlay.js')));
        expect(found?.href).toBe(pathToFileURL(join(root, 'config', 'heuristic-rules.json')).href);
      } finally {
        await rm(root, { recursive: true, force: true });
      }
    });

    it('should reject a rule without cues', () => {
      expect(() =>
        parseHeuristicRuleTable({ complexity: [{ targetClass: 'complex', bonus: 1, cues: [] }] })
      ).toThrow(ConfigurationError);
    });

    it('should reject a non-numeric bonus', () => {
      expect(() =>
        parseHeuristicRuleTable({ complexity: [{ targetClass: 'complex', bonus: 'high', cues: ['x'] }] })
      ).toThrow(ConfigurationError);
    });

    it('should report a missing rule file as a configuration error', async () => {
      await expect(loadHeuristicRules('/nonexistent/heuristic-rules.json')).rejects.toBeInstanceOf(
        ConfigurationError
      );
    });
  });
});
