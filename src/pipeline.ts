import type { Node, Position } from 'unist';
import type { Plugin, Transformer } from 'unified';
import { unified } from 'unified';
import { VFile } from 'vfile';

import type {
  AnyPass,
  Diagnostic,
  MigrationResult,
  Module,
  RunOptions,
  Severity
} from './types';
import { parse, print } from './cst';
import { run } from './runner';
import { defaultPasses } from './catalogue';
import { validatePasses } from './pass-validator';
import { decide } from './change-reporter';

export type MigrateOptions = RunOptions & {
  /** Ordered pass list. Defaults to the cocotb 2 catalogue. */
  passes?: readonly AnyPass[];
};

export type MigrateFileOptions = MigrateOptions & {
  /** Path recorded on the `VFile`, for reporting only; nothing is read. */
  path?: string;
};

type FileMessage = VFile['messages'][number];

function isModule(node: Node): node is Module {
  return node.type === 'Module' && 'body' in node && 'end' in node;
}

function isPosition(place: FileMessage['place']): place is Position {
  return place !== undefined && 'start' in place;
}

/**
 * unified parser plugin: source text → `Module`.
 *
 * @throws {ParseError} for text that is not valid Python.
 */
export const cstParse: Plugin<[], string, Module> = function () {
  this.parser = document => parse(document);
};

/**
 * unified transformer plugin: applies the passes and reports every diagnostic
 * as a message on the file.
 *
 * Severity maps onto `fatal` the way vfile reporters read it: `error` →
 * `true`, `warning` → `false`, `info` → `undefined`. The pass name becomes
 * the message `source`, the rule name its `ruleId`.
 */
export const cstMigrate: Plugin<[MigrateOptions?], Module> = function (options = {}) {
  const passes = options.passes ? validatePasses(options.passes) : defaultPasses;

  const transformer: Transformer<Module> = (tree, file) => {
    const outcome = run(tree, passes, { maxIterations: options.maxIterations });

    for (const diagnostic of outcome.diagnostics) {
      const message = file.message(diagnostic.message, {
        place: diagnostic.position,
        ruleId: diagnostic.rule,
        source: diagnostic.pass
      });
      message.fatal = fatalOf(diagnostic.severity);
    }

    return outcome.tree;
  };

  return transformer;
};

/** unified compiler plugin: `Module` → source text. */
export const cstStringify: Plugin<[], Module, string> = function () {
  this.compiler = tree => {
    if (!isModule(tree)) {
      throw new TypeError(`[cocotb-migrate] Expected a Module tree, received "${tree.type}".`);
    }
    return print(tree);
  };
};

function fatalOf(severity: Severity): boolean | undefined {
  if (severity === 'error') return true;
  if (severity === 'warning') return false;
  return undefined;
}

function severityOf(message: FileMessage): Severity {
  if (message.fatal === true) return 'error';
  if (message.fatal === false) return 'warning';
  return 'info';
}

/** Turns the messages `cstMigrate` put on a file back into diagnostics. */
export function diagnosticsOf(file: VFile): Diagnostic[] {
  return file.messages.map(message => ({
    pass: message.source ?? 'unknown',
    rule: message.ruleId,
    message: message.reason,
    severity: severityOf(message),
    position: isPosition(message.place) ? message.place : undefined
  }));
}

/** The parse → migrate → print processor. */
export function createProcessor(options: MigrateOptions = {}) {
  return unified().use(cstParse).use(cstMigrate, options).use(cstStringify);
}

/**
 * Migrates one file's text.
 *
 * Steps
 * -----
 * 1. Parse (all-or-nothing; a syntax error throws before any pass runs).
 * 2. Run the passes.
 * 3. Print the tree; untouched regions come back byte for byte.
 * 4. Decide `changed` by comparing texts.
 *
 * @throws {ParseError} when `source` is not valid Python.
 */
export function migrate(source: string, options: MigrateFileOptions = {}): MigrationResult {
  const { path, ...migrateOptions } = options;
  const file = createProcessor(migrateOptions).processSync(new VFile({ path, value: source }));
  const rewrittenText = String(file);

  return Object.freeze({
    rewrittenText,
    changed: decide(source, rewrittenText),
    diagnostics: Object.freeze(diagnosticsOf(file))
  });
}
