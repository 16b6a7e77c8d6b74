/**
 * Targets: references to single nodes of a build graph.
 */

import type { BuildGraph } from "./build-graph.js";
import type { RuleTemplate } from "./rule.js";

/**
 * Anything that can be flattened into an ordered list of manifest paths.
 */
export type TargetLike = string | Target | readonly TargetLike[] | null | undefined;

/**
 * A node of the build graph: a file path, or a phony alias name.
 *
 * Targets are frozen value objects. The empty path stands for "no real
 * input" and is used as the source of edges that take no inputs (a
 * submodule checkout, a toolchain build).
 */
export class Target {
  constructor(
    public readonly graph: BuildGraph,
    public readonly path: string,
    public readonly aliasName?: string
  ) {
    Object.freeze(this);
  }

  toString(): string {
    return this.path;
  }

  /**
   * Apply `rule` to this target, recording a build edge, and return the
   * produced target.
   */
  then(rule: RuleTemplate): Target {
    return rule.apply(this.graph, this, rule.resolveOutputPath(this));
  }

  /**
   * Declare a phony alias for this target. Returns a copy that carries the
   * alias name; the path is unchanged.
   */
  alias(name: string): Target {
    this.graph.alias(name, [this]);
    return new Target(this.graph, this.path, name);
  }

  /**
   * Add this target to the manifest's default set.
   */
  markDefault(): Target {
    this.graph.markDefault([this]);
    return this;
  }

  /**
   * Flatten strings, targets and nested lists into paths, in order.
   */
  static toPaths(value: TargetLike): string[] {
    if (value === null || value === undefined) {
      return [];
    }
    if (typeof value === "string") {
      return [value];
    }
    if (value instanceof Target) {
      return [value.path];
    }
    return value.flatMap((v) => Target.toPaths(v));
  }
}
