#!/usr/bin/env node
/**
 * Example build script for a project with two language definitions.
 *
 *   npx tsx scripts/example-project.ts              generate and build everything
 *   npx tsx scripts/example-project.ts -j4 imp      generate and build the imp alias
 *   npx tsx scripts/example-project.ts run tests/sum.imp
 *   npx tsx scripts/example-project.ts prove --definition fun proofs/sum-spec.k
 *
 * Arguments starting with kast, run or prove go to the runner; anything
 * else is passed to ninja after the manifest is written.
 */

import { existsSync } from "node:fs";
import {
  RUNNER_COMMANDS,
  Runner,
  ToolchainProject,
  createLogger,
  configuredLogLevel,
  config,
  discoverInputs,
  filterOut,
  initGenerationId,
  readListFile,
  validateConfig,
} from "../src/index.js";

const FAILING_LIST = "tests/failing.lst";

function buildProject(): ToolchainProject {
  const proj = new ToolchainProject();

  const imp = proj.definition({
    alias: "imp",
    backend: "llvm",
    main: "imp.k",
    other: ["imp-syntax.k"],
    krunFlags: "--output none",
  });
  const fun = proj.definition({
    alias: "fun",
    backend: "haskell",
    main: proj.source("doc/fun.md").then(proj.tangle()),
    kproveFlags: "--smt-timeout 1000",
  });

  const failing = existsSync(FAILING_LIST) ? readListFile(FAILING_LIST) : [];
  imp.tests({ inputs: filterOut(discoverInputs("tests/imp/*.imp"), failing), alias: "imp-tests" });
  fun.tests({ inputs: filterOut(discoverInputs("tests/fun/*.fun"), failing), alias: "fun-tests" });
  fun.proofs({ glob: "proofs/*-spec.k", alias: "proofs", markDefault: false });

  return proj;
}

async function main(argv: string[]): Promise<void> {
  validateConfig();
  const generationId = initGenerationId();
  const logger = createLogger({ level: configuredLogLevel(), logFile: config.logFile });
  logger.debug("Generating manifest", { generationId, argv });

  const proj = buildProject();
  const [first] = argv;
  if (first !== undefined && RUNNER_COMMANDS.some((command) => command === first)) {
    await new Runner(proj, { defaultDefinition: "imp" }).main(argv);
    return;
  }
  await proj.main(argv);
}

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error("Build failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
