/**
 * Definition registry.
 *
 * Definitions are looked up by alias, in the order they were created. The
 * first registered definition is the dispatcher's fallback default.
 */

import { ConfigurationError } from "../graph/errors.js";
import type { Definition } from "./definition.js";

export class DefinitionRegistry implements Iterable<Definition> {
  private readonly byAlias = new Map<string, Definition>();

  /**
   * @throws ConfigurationError if the alias is taken
   */
  register(definition: Definition): void {
    if (this.byAlias.has(definition.alias)) {
      throw new ConfigurationError(`Definition alias "${definition.alias}" is already registered`, {
        rule: definition.alias,
        attribute: "alias",
      });
    }
    this.byAlias.set(definition.alias, definition);
  }

  has(alias: string): boolean {
    return this.byAlias.has(alias);
  }

  get(alias: string): Definition | undefined {
    return this.byAlias.get(alias);
  }

  /** Registered aliases, in registration order. */
  aliases(): string[] {
    return [...this.byAlias.keys()];
  }

  first(): Definition | undefined {
    return this.byAlias.values().next().value;
  }

  get size(): number {
    return this.byAlias.size;
  }

  [Symbol.iterator](): Iterator<Definition> {
    return this.byAlias.values();
  }
}
