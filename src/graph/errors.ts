/**
 * Errors raised while a build graph is being declared.
 *
 * All of them are thrown synchronously from the call that supplied the
 * malformed rule, edge or alias. Graph declaration is a one-shot phase, so
 * none of them is meant to be caught and skipped.
 */

/**
 * Which rule and which attribute of it were malformed.
 */
export interface ConfigurationErrorDetails {
  /** Rule (or definition alias) the error belongs to */
  rule?: string;
  /** Offending attribute, e.g. "output", "extension", "directory" */
  attribute?: string;
}

export class ConfigurationError extends Error {
  public readonly rule?: string;
  public readonly attribute?: string;

  constructor(message: string, details: ConfigurationErrorDetails = {}) {
    super(message);
    this.name = "ConfigurationError";
    this.rule = details.rule;
    this.attribute = details.attribute;
  }
}

/**
 * A rule name was registered twice with different bodies.
 */
export class RuleConflictError extends ConfigurationError {
  constructor(
    rule: string,
    public readonly attributeName: "description" | "command",
    public readonly registered: string | undefined,
    public readonly requested: string | undefined
  ) {
    super(
      `Rule "${rule}" is already registered with a different ${attributeName}: ` +
        `${JSON.stringify(registered)} (registered) vs ${JSON.stringify(requested)} (requested)`,
      { rule, attribute: attributeName }
    );
    this.name = "RuleConflictError";
  }
}

/**
 * A command placeholder has no binding on the edge that uses it.
 */
export class UnboundVariableError extends ConfigurationError {
  constructor(
    rule: string,
    public readonly variables: string[]
  ) {
    super(
      `Rule "${rule}" references unbound variable(s) in its command: ` +
        variables.map((v) => `$${v}`).join(", "),
      { rule, attribute: "variables" }
    );
    this.name = "UnboundVariableError";
  }
}

/**
 * The manifest was already flushed.
 */
export class GraphFinalizedError extends Error {
  constructor(operation: string) {
    super(`Cannot ${operation}: the build graph has already been flushed`);
    this.name = "GraphFinalizedError";
  }
}
