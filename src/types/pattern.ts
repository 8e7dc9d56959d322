import type { NodeType } from './cst';

/**
 * Literal value a {@link Pattern} can compare against.
 * Numbers compare numerically (`0x10` equals `16`), strings by their decoded
 * content (`'a'` equals `"a"`).
 */
export type LiteralValue = string | number;

/**
 * Declarative description of a node's shape.
 *
 * Patterns are plain, serialisable data; `matches` is their only interpreter.
 * They never mutate the node they inspect.
 */
export type Pattern =
  | { match: 'any' }
  | { match: 'kind'; types: readonly NodeType[] }

  /**
   * Dotted name equality over a `Name`/`Attribute` chain. `path` is the list
   * of segments, e.g. `['cocotb', 'triggers', 'RisingEdge']`.
   */
  | { match: 'qualifiedName'; path: readonly string[] }
  | { match: 'attribute'; value?: Pattern; attr?: string }

  /**
   * `args` constrains the positional arguments: when present, their count
   * must be equal and each must match pairwise. `keywords` constrains keyword
   * arguments by name; unlisted keywords are unconstrained.
   */
  | {
      match: 'call';
      func?: Pattern;
      args?: readonly Pattern[];
      keywords?: Readonly<Record<string, Pattern>>;
    }

  /** `delegate` constrains `yield from` when set; absent means either form. */
  | { match: 'yieldOf'; value?: Pattern; delegate?: boolean }
  | { match: 'raiseOf'; exc?: Pattern }

  /** `decorator` matches when any decorator expression matches it. */
  | { match: 'functionDef'; decorator?: Pattern; async?: boolean }
  | { match: 'hasKeyword'; name: string; value?: Pattern }
  | { match: 'literal'; value: LiteralValue }
  | { match: 'allOf'; patterns: readonly Pattern[] }
  | { match: 'anyOf'; patterns: readonly Pattern[] }
  | { match: 'not'; pattern: Pattern };

export type PatternKind = Pattern['match'];
