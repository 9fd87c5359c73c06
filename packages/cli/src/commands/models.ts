import type { Command } from 'commander';
import {
  OpenRouterGateway,
  ConfigService,
  JsonConfigStore,
  PlaintextSecretStore,
  type OpenRouterModelInfo,
} from '@conclave/core';
import { getConfigDir } from '../adapters/xdg-paths.js';
import { formatModelPrice, modelVendor } from '../format.js';

const LIST_LIMIT = 50;

export function registerModelsCommand(program: Command): void {
  program
    .command('models')
    .description('List OpenRouter models usable as council members or chairman')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      const configService = new ConfigService(new JsonConfigStore(getConfigDir()), new PlaintextSecretStore());
      const config = await configService.resolve();

      if (!config.apiKey) {
        console.error('OpenRouter API key not configured. Run: conclave config set api-key');
        process.exit(1);
      }

      const gateway = new OpenRouterGateway(config.apiKey, config.apiUrl);
      let models: OpenRouterModelInfo[];
      try {
        models = await gateway.fetchModels();
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }

      if (opts.json) {
        console.log(JSON.stringify(models, null, 2));
        return;
      }

      console.log(`\n  OpenRouter Models (${models.length}):\n`);
      for (const m of models.slice(0, LIST_LIMIT)) {
        console.log(`  ${m.id.padEnd(45)} ${modelVendor(m.id).padEnd(14)} ${formatModelPrice(m.pricing).padEnd(28)} ${m.name}`);
      }
      if (models.length > LIST_LIMIT) {
        console.log(`  ... and ${models.length - LIST_LIMIT} more (use --json for full list)`);
      }
      console.log();
    });
}
