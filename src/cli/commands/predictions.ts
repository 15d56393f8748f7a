import type { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { Client } from '../../client/client.js';
import { collect, cursorOption, parseInputs, printJson, timeoutMs } from '../inputs.js';

export function registerPredictionsCommand(program: Command): void {
  const predictions = program.command('predictions').description('Manage predictions');

  predictions
    .command('list')
    .description('List your predictions')
    .option('--cursor <url>', 'Page link from a previous listing')
    .action(async (opts: { cursor?: string }) => {
      const client = Client.fromConfig(loadConfig());
      printJson(await client.predictions.list(cursorOption(opts.cursor)));
    });

  predictions
    .command('get <id>')
    .description('Show a prediction')
    .action(async (id: string) => {
      const client = Client.fromConfig(loadConfig());
      printJson(await client.predictions.get(id));
    });

  predictions
    .command('create <version>')
    .description('Start a prediction without waiting for it')
    .option('-i, --input <key=value>', 'Input value (repeatable; @path reads a file)', collect, [])
    .option('--webhook <url>', 'Webhook for prediction updates')
    .action(async (version: string, opts: { input: string[]; webhook?: string }) => {
      const client = Client.fromConfig(loadConfig());
      const prediction = await client.predictions.create(
        version,
        parseInputs(opts.input),
        opts.webhook !== undefined ? { webhook: opts.webhook } : {},
      );
      printJson(prediction);
    });

  predictions
    .command('cancel <id>')
    .description('Cancel a prediction')
    .action(async (id: string) => {
      const client = Client.fromConfig(loadConfig());
      printJson(await client.predictions.cancel(id));
    });

  predictions
    .command('wait <id>')
    .description('Poll a prediction until it succeeds, fails or is canceled')
    .option('--timeout <seconds>', 'Give up after this many seconds')
    .action(async (id: string, opts: { timeout?: string }) => {
      const signal =
        opts.timeout !== undefined ? AbortSignal.timeout(timeoutMs(opts.timeout)) : undefined;
      const client = Client.fromConfig(loadConfig());
      const prediction = await client.predictions.get(id);
      await prediction.wait({ signal });
      printJson(prediction);
    });
}
