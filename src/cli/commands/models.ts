import type { Command } from 'commander';
import type { ModelVisibility } from '../../types/resource.types.js';
import { loadConfig } from '../../config/loader.js';
import { Client } from '../../client/client.js';
import { parseModelKey } from '../../namespaces/modelKey.js';
import { InvalidArgumentError } from '../../errors/argument.js';
import { cursorOption, printJson } from '../inputs.js';

interface CreateOpts {
  visibility: string;
  hardware: string;
  description?: string;
  githubUrl?: string;
  paperUrl?: string;
  licenseUrl?: string;
  coverImageUrl?: string;
}

function toVisibility(value: string): ModelVisibility {
  if (value === 'public' || value === 'private') return value;
  throw new InvalidArgumentError(`--visibility must be "public" or "private", got "${value}"`);
}

export function registerModelsCommand(program: Command): void {
  const models = program.command('models').description('Browse and create models');

  models
    .command('list')
    .description('List public models')
    .option('--cursor <url>', 'Page link from a previous listing')
    .action(async (opts: { cursor?: string }) => {
      const client = Client.fromConfig(loadConfig());
      printJson(await client.models.list(cursorOption(opts.cursor)));
    });

  models
    .command('get <model>')
    .description('Show a model by owner/name')
    .action(async (key: string) => {
      const client = Client.fromConfig(loadConfig());
      printJson(await client.models.get(key));
    });

  models
    .command('create <model>')
    .description('Create a model named owner/name')
    .requiredOption('--visibility <visibility>', 'public or private')
    .requiredOption('--hardware <sku>', 'Hardware SKU to run the model on')
    .option('--description <text>', 'Model description')
    .option('--github-url <url>', 'Source repository')
    .option('--paper-url <url>', 'Paper describing the model')
    .option('--license-url <url>', 'License')
    .option('--cover-image-url <url>', 'Cover image')
    .action(async (key: string, opts: CreateOpts) => {
      const { owner, name } = parseModelKey(key);
      const client = Client.fromConfig(loadConfig());
      const model = await client.models.create({
        owner,
        name,
        visibility: toVisibility(opts.visibility),
        hardware: opts.hardware,
        ...(opts.description !== undefined && { description: opts.description }),
        ...(opts.githubUrl !== undefined && { githubUrl: opts.githubUrl }),
        ...(opts.paperUrl !== undefined && { paperUrl: opts.paperUrl }),
        ...(opts.licenseUrl !== undefined && { licenseUrl: opts.licenseUrl }),
        ...(opts.coverImageUrl !== undefined && { coverImageUrl: opts.coverImageUrl }),
      });
      printJson(model);
    });
}
