import { createInterface } from 'node:readline';
import type { Command } from 'commander';
import { JsonConfigStore, ConfigService, PlaintextSecretStore, MAX_TIMEOUT_MS } from '@conclave/core';
import { getConfigDir } from '../adapters/xdg-paths.js';
import { parseModelList } from '../run-options.js';

const CONFIG_KEYS = ['api-key', 'chairman', 'council', 'timeout'];

function prompt(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

function createConfigService(): ConfigService {
  return new ConfigService(new JsonConfigStore(getConfigDir()), new PlaintextSecretStore());
}

export function maskApiKey(apiKey: string): string {
  return apiKey ? '***' + apiKey.slice(-4) : '(not set)';
}

async function showConfig(opts: { json?: boolean }): Promise<void> {
  const resolved = await createConfigService().resolve();

  const display = {
    apiKey: maskApiKey(resolved.apiKey),
    apiUrl: resolved.apiUrl,
    councilModels: resolved.councilModels,
    chairmanModel: resolved.chairmanModel,
    timeoutMs: resolved.timeoutMs,
    configDir: getConfigDir(),
  };

  if (opts.json) {
    console.log(JSON.stringify(display, null, 2));
  } else {
    console.log(`\n  Configuration:`);
    console.log(`  API Key:        ${display.apiKey}`);
    console.log(`  API URL:        ${display.apiUrl}`);
    console.log(`  Council:        ${display.councilModels.join(', ')}`);
    console.log(`  Chairman:       ${display.chairmanModel}`);
    console.log(`  Timeout:        ${display.timeoutMs}ms`);
    console.log(`  Config Dir:     ${display.configDir}`);
    console.log();
  }
}

async function setConfig(key: string, value: string | undefined): Promise<void> {
  const configService = createConfigService();

  switch (key) {
    case 'api-key': {
      const apiKey = value ?? (await prompt('OpenRouter API Key: '));
      if (!apiKey) {
        console.error('No API key provided.');
        process.exit(1);
      }
      await configService.saveApiKey(apiKey);
      console.log('API key saved.');
      break;
    }
    case 'chairman': {
      if (!value) {
        console.error('Usage: conclave config set chairman <model-id>');
        process.exit(1);
      }
      await configService.saveCouncilConfig({ chairmanModel: value });
      console.log(`Chairman model set to: ${value}`);
      break;
    }
    case 'council': {
      if (!value) {
        console.error('Usage: conclave config set council <model1,model2,...>');
        process.exit(1);
      }
      const models = parseModelList(value);
      await configService.saveCouncilConfig({ councilModels: models });
      console.log(`Council models set to: ${models.join(', ')}`);
      break;
    }
    case 'timeout': {
      const timeoutMs = Number(value);
      if (!value || !Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
        console.error(`Usage: conclave config set timeout <milliseconds, at most ${MAX_TIMEOUT_MS}>`);
        process.exit(1);
      }
      await configService.saveCouncilConfig({ timeoutMs });
      console.log(`Timeout set to: ${timeoutMs}ms`);
      break;
    }
    default:
      console.error(`Unknown config key: ${key}. Valid keys: ${CONFIG_KEYS.join(', ')}`);
      process.exit(1);
  }
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage configuration');

  config
    .command('show', { isDefault: true })
    .description('Show current configuration')
    .option('--json', 'Output as JSON')
    .action(showConfig);

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', `Configuration key (${CONFIG_KEYS.join(', ')})`)
    .argument('[value]', 'Value to set')
    .action(async (key: string, value?: string) => {
      try {
        await setConfig(key, value);
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
      }
    });

  config
    .command('reset')
    .description('Reset configuration to defaults')
    .action(async () => {
      const configStore = new JsonConfigStore(getConfigDir());
      await configStore.saveCouncilConfigPrefs({});
      console.log('Configuration reset to defaults.');
    });

  config
    .command('path')
    .description('Print the preferences file location')
    .action(() => {
      console.log(new JsonConfigStore(getConfigDir()).prefsPath);
    });
}
