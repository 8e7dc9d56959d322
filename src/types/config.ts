/**
 * Tables that drive the default pass catalogue.
 *
 * Dotted names (`cocotb.triggers.RisingEdge`) are matched against
 * `Name`/`Attribute` chains segment by segment; a bare name (`Clock`) only
 * matches the bare spelling.
 *
 * The bundled defaults live in `src/config/cocotb2.json`.
 */
export type MigrationConfig = {
  coroutineMarker: {
    /** Decorators that are dropped; the function becomes `async def`. */
    legacy: string[];

    /**
     * Decorators that stay but still require `async def`. Matched both bare
     * (`@cocotb.test`) and called (`@cocotb.test()`).
     */
    retained: string[];
  };

  returnValue: {
    /** Exception classes whose `raise` turns into `return`. */
    exceptions: string[];

    /** Keyword that may carry the value instead of a positional argument. */
    keyword: string;
  };

  /** Legacy callee → replacement callee; arguments stay untouched. */
  callRename: Record<string, string>;

  startUnwrap: {
    /** Task launchers whose sole argument may be unwrapped. */
    launchers: string[];

    /** Method names that already start their own task (`clock.start()`). */
    methods: string[];
  };

  keywordRename: Array<{
    callees: string[];
    renames: Record<string, string>;
  }>;

  keywordRemoval: Array<{
    /** Method name, matched on any receiver. */
    method: string;
    keywords: string[];
    message: string;

    /** Comment line added to the top of the file once per run. */
    advisory?: string;
  }>;

  valueAccessor: {
    /** Attribute a signal's value is read through (`sig.value`). */
    receiver: string;

    /**
     * Legacy attribute → replacement template. `__value__` in the template
     * stands for the receiver expression.
     */
    attributes: Record<string, string>;

    /** Legacy zero-argument method → replacement template. */
    methods: Record<string, string>;
  };

  removedAttribute: Array<{
    attribute: string;
    message: string;
    advisory: string;
  }>;

  /** Namespace → symbols that must be called through it. */
  qualifyNames: Record<string, string[]>;
};

/** Per-table overrides accepted by `createCatalogue`. */
export type MigrationConfigOverrides = Partial<MigrationConfig>;
