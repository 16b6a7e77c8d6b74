/**
 * Command-line errors of the dispatcher. Both are raised while arguments
 * are parsed, before anything is launched.
 */

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class UnknownDefinitionError extends UsageError {
  constructor(
    public readonly definition: string,
    public readonly choices: readonly string[]
  ) {
    super(
      `argument --definition: invalid choice: "${definition}" ` +
        `(choose from ${choices.map((c) => `"${c}"`).join(", ")})`
    );
    this.name = "UnknownDefinitionError";
  }
}
