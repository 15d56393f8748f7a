#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerModelsCommand } from './commands/models.js';
import { registerVersionsCommand } from './commands/versions.js';
import { registerPredictionsCommand } from './commands/predictions.js';
import { registerRunCommand } from './commands/run.js';

const require = createRequire(import.meta.url);

const pkg = require('../../package.json') as { version: string; description: string };

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('infersync')
    .description(pkg.description)
    .version(pkg.version);

  registerModelsCommand(program);
  registerVersionsCommand(program);
  registerPredictionsCommand(program);
  registerRunCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`[infersync] Error: ${message}\n`);
  process.exit(1);
});
