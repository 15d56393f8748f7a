import type { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { Client } from '../../client/client.js';
import { cursorOption, printJson } from '../inputs.js';

export function registerVersionsCommand(program: Command): void {
  const versions = program.command('versions').description('Browse the versions of a model');

  versions
    .command('list <model>')
    .description('List versions of owner/name, newest first')
    .option('--cursor <url>', 'Page link from a previous listing')
    .action(async (key: string, opts: { cursor?: string }) => {
      const client = Client.fromConfig(loadConfig());
      printJson(await client.models.versions(key).list(cursorOption(opts.cursor)));
    });

  versions
    .command('get <model> <id>')
    .description('Show one version of owner/name')
    .action(async (key: string, id: string) => {
      const client = Client.fromConfig(loadConfig());
      printJson(await client.models.versions(key).get(id));
    });
}
