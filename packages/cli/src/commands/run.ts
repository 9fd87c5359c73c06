import { readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { Command } from 'commander';
import {
  DeliberationService,
  OpenRouterGateway,
  JsonRunRepository,
  JsonConfigStore,
  PlaintextSecretStore,
  ConfigService,
  PipelineCancelledError,
  setLogLevel,
  type CouncilConfig,
} from '@conclave/core';
import { createCallbackEventBridge } from '../adapters/callback-event-bridge.js';
import { NullRunRepository } from '../adapters/null-run-repository.js';
import { getConfigDir, getDataDir } from '../adapters/xdg-paths.js';
import { createFormatter, isOutputFormat, OUTPUT_FORMATS } from '../formatters/formatter.js';
import { renderForTerminal } from '../formatters/terminal.js';
import { formatDuration, formatTokens, totalUsage } from '../format.js';
import { applyRunOverrides, type ConfigOverrides } from '../run-options.js';

interface RunOptions extends ConfigOverrides {
  file?: string;
  format?: string;
  output?: string;
  save: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

const STATUS_ICONS = { running: '▶', success: '✓', error: '✗' } as const;

function readPrompt(promptParts: string[], file?: string): string {
  if (file) {
    return (file === '-' ? readFileSync('/dev/stdin', 'utf-8') : readFileSync(resolve(file), 'utf-8')).trim();
  }
  return promptParts.join(' ').trim();
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Ask the council a question')
    .argument('[prompt...]', 'The prompt to deliberate on')
    .option('-f, --file <path>', 'Read prompt from file (- for stdin)')
    .option('--council <list>', 'Council models (comma-separated OpenRouter model IDs)')
    .option('--chairman <model>', 'Chairman model (OpenRouter model ID)')
    .option('--timeout <ms>', 'Per-call timeout in milliseconds')
    .option('--format <type>', `Output format: ${OUTPUT_FORMATS.join(', ')} (default: md on a TTY, json otherwise)`)
    .option('--output <file>', 'Save synthesis to file')
    .option('--no-save', "Don't persist run to history")
    .option('--verbose', 'Debug logging')
    .option('--quiet', 'Minimal output')
    .action(async (promptParts: string[], opts: RunOptions) => {
      if (opts.verbose) setLogLevel('debug');
      else setLogLevel(opts.quiet ? 'error' : 'warn');

      const prompt = readPrompt(promptParts, opts.file);
      if (!prompt) {
        console.error('Error: No prompt provided. Use `conclave run <prompt>` or `conclave run -f <file>`');
        process.exit(1);
      }

      const format = opts.format ?? (process.stdout.isTTY ? 'md' : 'json');
      if (!isOutputFormat(format)) {
        console.error(`Error: Unknown format "${format}". Use one of: ${OUTPUT_FORMATS.join(', ')}`);
        process.exit(1);
      }
      const formatter = createFormatter(format);
      const showProgress = !opts.quiet;

      const secretStore = new PlaintextSecretStore();
      const configStore = new JsonConfigStore(getConfigDir());
      let config: CouncilConfig;
      try {
        config = applyRunOverrides(await new ConfigService(configStore, secretStore).resolve(), opts);
      } catch (err) {
        console.error(formatter.formatError(err instanceof Error ? err.message : String(err)));
        process.exit(1);
      }

      const events = createCallbackEventBridge({
        onStageChange: (stage, summary) => {
          if (showProgress) console.error(`\n  Stage ${stage}: ${summary}\n`);
        },
        onModelStatus: (_stage, model, status) => {
          if (showProgress && status !== 'running') console.error(`  ${STATUS_ICONS[status]} ${model}: ${status}`);
        },
      });

      const service = new DeliberationService({
        createGateway: (c) => new OpenRouterGateway(c.apiKey, c.apiUrl),
        configStore,
        secretStore,
        runRepository: opts.save ? new JsonRunRepository(getDataDir()) : new NullRunRepository(),
        events,
      });

      const onSigint = () => {
        console.error('\n  Cancelling...');
        service.cancelAll();
      };
      process.once('SIGINT', onSigint);

      const startedAt = Date.now();
      try {
        const { record } = await service.run({ prompt, config });
        const output = formatter.formatComplete(record);
        console.log(format === 'md' && process.stdout.isTTY ? renderForTerminal(output) : output);

        if (opts.output) {
          writeFileSync(resolve(opts.output), record.stage3.response, 'utf-8');
          if (showProgress) console.error(`  Synthesis saved to: ${opts.output}`);
        }
        if (showProgress) {
          const tokens = totalUsage(record).totalTokens;
          console.error(`\n  ${formatTokens(tokens)} in ${formatDuration(Date.now() - startedAt)}`);
          if (opts.save) console.error(`  Run saved: ${record.id}`);
        }
      } catch (err) {
        console.error(formatter.formatError(err instanceof Error ? err.message : String(err)));
        process.exitCode = err instanceof PipelineCancelledError ? 130 : 1;
      } finally {
        process.removeListener('SIGINT', onSigint);
      }
    });
}
