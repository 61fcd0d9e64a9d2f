#!/usr/bin/env node
import { buildCli } from "./cli.js";
import { formatError } from "./errors.js";
import { runHarness } from "./harness.js";

const program = buildCli({
  runHarness: async (config) => {
    await runHarness(config);
    process.exit(0);
  },
});

program.parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(`streamload: ${formatError(err)}\n`);
  process.exit(1);
});
