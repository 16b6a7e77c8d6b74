/**
 * Project options loader and validator.
 *
 * Validates against the schema with fail-fast behavior, produces
 * structured error messages, and freezes the result.
 */

import type { ZodIssue } from "zod";
import { ProjectOptionsSchema, type ProjectOptions } from "./schema.js";

/**
 * Individual validation issue.
 */
export interface ProjectOptionsIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Structured validation error for project options.
 */
export class ProjectOptionsError extends Error {
  public readonly issues: ProjectOptionsIssue[];

  constructor(message: string, issues: ProjectOptionsIssue[]) {
    super(message);
    this.name = "ProjectOptionsError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Project options validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function formatZodIssues(zodIssues: ZodIssue[]): ProjectOptionsIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate and load project options.
 *
 * @param input - Raw options object, usually DEFAULT_PROJECT_OPTIONS spread with overrides
 * @returns Validated and frozen options
 * @throws ProjectOptionsError if validation fails
 */
export function loadProjectOptions(input: unknown): Readonly<ProjectOptions> {
  const result = ProjectOptionsSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ProjectOptionsError(
      `Invalid project options: ${issues.length} validation error(s)`,
      issues
    );
  }

  return Object.freeze(result.data);
}

/**
 * Validate project options without loading them.
 */
export function validateProjectOptions(input: unknown): {
  success: boolean;
  options?: ProjectOptions;
  errors?: ProjectOptionsIssue[];
} {
  const result = ProjectOptionsSchema.safeParse(input);

  if (result.success) {
    return { success: true, options: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}
