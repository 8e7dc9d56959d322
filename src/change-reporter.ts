import type { AnyPass, Finding, Module } from './types';
import { parse, spanOf, walk } from './cst';
import { matches } from './matcher';
import { defaultPasses } from './catalogue';

/**
 * Whether a migration changed the file. Plain textual inequality: trivia-only
 * differences count, structurally equal trees printed differently do too.
 */
export function decide(originalText: string, rewrittenText: string): boolean {
  return originalText !== rewrittenText;
}

/**
 * Pre-scan: the nodes each rule's pattern matches, without rewriting.
 *
 * One finding per (rule, node) pair, in pass order and then node-visitation
 * order. This over-approximates a real run: rules may still decline a matched
 * node (a `yield` outside a coroutine, a keyword whose new name is taken),
 * and rewrites of earlier passes are not visible to later ones.
 *
 * @throws {ParseError} when given text that is not valid Python.
 */
export function wouldTouch(
  source: string | Module,
  passes: readonly AnyPass[] = defaultPasses
): Finding[] {
  const tree = typeof source === 'string' ? parse(source) : source;
  const findings: Finding[] = [];

  for (const pass of passes) {
    walk(tree, node => {
      for (const rule of pass.rules) {
        if (rule.kind !== node.type || !matches(node, rule.pattern)) continue;
        findings.push({ pass: pass.name, rule: rule.name, kind: node.type, position: spanOf(node) });
      }
    });
  }

  return findings;
}
