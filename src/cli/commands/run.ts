import type { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { Client, parseVersionRef } from '../../client/client.js';
import { collect, parseInputs, printJson } from '../inputs.js';

function writeOutputItem(item: unknown): void {
  process.stdout.write(typeof item === 'string' ? item : `${JSON.stringify(item)}\n`);
}

export function registerRunCommand(program: Command): void {
  program
    .command('run <ref>')
    .description('Run owner/name:version (or a version id) and print its output')
    .option('-i, --input <key=value>', 'Input value (repeatable; @path reads a file)', collect, [])
    .option('--stream', 'Print output elements as they are produced')
    .action(async (ref: string, opts: { input: string[]; stream?: boolean }) => {
      const client = Client.fromConfig(loadConfig());
      const input = parseInputs(opts.input);

      if (!opts.stream) {
        printJson(await client.run(ref, input));
        return;
      }

      const prediction = await client.predictions.create(parseVersionRef(ref), input);
      let lastReported = -1;
      for await (const item of prediction.outputIterator()) {
        writeOutputItem(item);
        const progress = prediction.progress;
        if (progress && progress.current !== lastReported) {
          lastReported = progress.current;
          client.logger.info(
            `progress ${Math.round(progress.percentage * 100)}% (${progress.current}/${progress.total})`,
          );
        }
      }
      process.stdout.write('\n');
    });
}
