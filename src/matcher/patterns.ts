import type { LiteralValue, NodeType, Pattern } from '../types';

/*
 * Pattern constructors.
 *
 * Each returns plain data; nothing here inspects a node. Interpretation is
 * the job of `matches`.
 */

/** Matches any node (but not an absent one). */
export function any(): Pattern {
  return { match: 'any' };
}

export function kind(...types: NodeType[]): Pattern {
  return { match: 'kind', types };
}

/**
 * Matches a `Name`/`Attribute` chain spelling exactly `path`.
 * Segments may be given separately or dotted:
 * `qualifiedName('cocotb', 'fork')` equals `qualifiedName('cocotb.fork')`.
 */
export function qualifiedName(...segments: string[]): Pattern {
  return { match: 'qualifiedName', path: segments.flatMap(segment => segment.split('.')) };
}

/** Matches any of the given dotted names. */
export function oneOfNames(paths: readonly string[]): Pattern {
  return anyOf(...paths.map(path => qualifiedName(path)));
}

export function attribute(shape: { value?: Pattern; attr?: string } = {}): Pattern {
  return { match: 'attribute', ...shape };
}

export function call(
  shape: {
    func?: Pattern;
    args?: readonly Pattern[];
    keywords?: Readonly<Record<string, Pattern>>;
  } = {}
): Pattern {
  return { match: 'call', ...shape };
}

export function yieldOf(value?: Pattern, delegate?: boolean): Pattern {
  return { match: 'yieldOf', value, delegate };
}

export function raiseOf(exc?: Pattern): Pattern {
  return { match: 'raiseOf', exc };
}

export function functionDef(shape: { decorator?: Pattern; async?: boolean } = {}): Pattern {
  return { match: 'functionDef', ...shape };
}

export function hasKeyword(name: string, value?: Pattern): Pattern {
  return { match: 'hasKeyword', name, value };
}

export function literal(value: LiteralValue): Pattern {
  return { match: 'literal', value };
}

export function allOf(...patterns: Pattern[]): Pattern {
  return { match: 'allOf', patterns };
}

export function anyOf(...patterns: Pattern[]): Pattern {
  return { match: 'anyOf', patterns };
}

export function not(pattern: Pattern): Pattern {
  return { match: 'not', pattern };
}
