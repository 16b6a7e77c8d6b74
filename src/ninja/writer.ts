/**
 * Ninja build-file syntax writer.
 *
 * Produces the text of a `build.ninja` file one declaration at a time.
 * The writer only knows Ninja's surface syntax; deciding what to declare
 * and in which order belongs to the BuildGraph.
 *
 * Long lines are wrapped at `width` columns with Ninja's ` $` continuation.
 * A line is only broken at a space that is not itself escaped (an odd run
 * of `$` before the space means the space is part of a path).
 */

export interface RuleDeclaration {
  command: string;
  description?: string;
}

export interface BuildDeclaration {
  inputs?: readonly string[];
  implicit?: readonly string[];
  orderOnly?: readonly string[];
  implicitOutputs?: readonly string[];
  pool?: string;
  variables?: Readonly<Record<string, string>>;
}

/**
 * Escape a path for use in a build or default line.
 */
export function escapePath(word: string): string {
  return word.replaceAll("$ ", "$$$$ ").replaceAll(" ", "$$ ").replaceAll(":", "$$:");
}

/**
 * Escape a literal string so Ninja does not expand anything in it.
 */
export function escape(text: string): string {
  if (text.includes("\n")) {
    throw new Error("Ninja syntax does not allow newlines in values");
  }
  return text.replaceAll("$", "$$$$");
}

/**
 * Greedy word wrap that never breaks inside a word.
 */
function wrapWords(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = "";
  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    if (current.length === 0) {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current += ` ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current.length > 0) {
    lines.push(current);
  }
  return lines;
}

export class NinjaWriter {
  private readonly chunks: string[] = [];

  constructor(private readonly width = 78) {}

  newline(): void {
    this.chunks.push("\n");
  }

  comment(text: string): void {
    for (const line of wrapWords(text, this.width - 2)) {
      this.chunks.push(`# ${line}\n`);
    }
  }

  /**
   * Declare `key = value`. Lists are joined with single spaces, skipping
   * empty entries; an undefined value declares nothing.
   */
  variable(key: string, value: string | readonly string[] | undefined, indent = 0): void {
    if (value === undefined) {
      return;
    }
    const text = typeof value === "string" ? value : value.filter((v) => v.length > 0).join(" ");
    this.line(text.length > 0 ? `${key} = ${text}` : `${key} =`, indent);
  }

  pool(name: string, depth: number): void {
    this.line(`pool ${name}`);
    this.variable("depth", String(depth), 1);
  }

  rule(name: string, declaration: RuleDeclaration): void {
    this.line(`rule ${name}`);
    this.variable("command", declaration.command, 1);
    if (declaration.description) {
      this.variable("description", declaration.description, 1);
    }
  }

  build(outputs: readonly string[], rule: string, declaration: BuildDeclaration = {}): void {
    const outParts = outputs.map(escapePath);
    const inParts = (declaration.inputs ?? []).filter((p) => p.length > 0).map(escapePath);

    const implicit = declaration.implicit ?? [];
    if (implicit.length > 0) {
      inParts.push("|", ...implicit.map(escapePath));
    }
    const orderOnly = declaration.orderOnly ?? [];
    if (orderOnly.length > 0) {
      inParts.push("||", ...orderOnly.map(escapePath));
    }
    const implicitOutputs = declaration.implicitOutputs ?? [];
    if (implicitOutputs.length > 0) {
      outParts.push("|", ...implicitOutputs.map(escapePath));
    }

    this.line(`build ${outParts.join(" ")}: ${[rule, ...inParts].join(" ")}`);

    if (declaration.pool !== undefined) {
      this.line(`pool = ${declaration.pool}`, 1);
    }
    for (const [key, value] of Object.entries(declaration.variables ?? {})) {
      this.variable(key, value, 1);
    }
  }

  defaultTargets(paths: readonly string[]): void {
    this.line(`default ${paths.map(escapePath).join(" ")}`);
  }

  toString(): string {
    return this.chunks.join("");
  }

  // ============================================================
  // Line wrapping
  // ============================================================

  private countDollarsBefore(text: string, index: number): number {
    let count = 0;
    let i = index - 1;
    while (i >= 0 && text[i] === "$") {
      count++;
      i--;
    }
    return count;
  }

  private isBreakable(text: string, index: number): boolean {
    return index < 0 || this.countDollarsBefore(text, index) % 2 === 0;
  }

  private line(input: string, indent = 0): void {
    let text = input;
    let leading = "  ".repeat(indent);

    while (leading.length + text.length > this.width) {
      const available = this.width - leading.length - " $".length;

      // Last unescaped space that keeps the line within the width...
      let space = available;
      do {
        space = space > 0 ? text.lastIndexOf(" ", space - 1) : -1;
      } while (!this.isBreakable(text, space));

      // ...or, failing that, the first one after it.
      if (space < 0) {
        space = available - 1;
        do {
          space = text.indexOf(" ", space + 1);
        } while (!this.isBreakable(text, space));
      }

      if (space < 0) {
        break;
      }

      this.chunks.push(`${leading}${text.slice(0, space)} $\n`);
      text = text.slice(space + 1);
      leading = "  ".repeat(indent + 2);
    }

    this.chunks.push(`${leading}${text}\n`);
  }
}
