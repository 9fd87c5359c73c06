import type { Command } from 'commander';
import { JsonRunRepository, reconstructRunMetadata, type RunRecord } from '@conclave/core';
import { getDataDir } from '../adapters/xdg-paths.js';
import { JsonFormatter } from '../formatters/json.js';

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('List or view past deliberation runs')
    .argument('[run-id]', 'View a specific run by ID')
    .option('--json', 'Output as JSON')
    .option('--last', 'Show the most recent run')
    .option('--synthesis', 'Show only the synthesis text')
    .action(async (runId: string | undefined, opts: { json?: boolean; last?: boolean; synthesis?: boolean }) => {
      const repo = new JsonRunRepository(getDataDir());

      if (opts.last) {
        const runs = await repo.list();
        if (runs.length === 0) {
          console.log('No runs found.');
          return;
        }
        runId = runs[0].id;
      }

      if (runId) {
        let run: RunRecord;
        try {
          run = await repo.load(runId);
        } catch (err) {
          console.error(`Cannot load run ${runId}: ${err instanceof Error ? err.message : String(err)}`);
          process.exit(1);
        }

        if (opts.json) {
          console.log(new JsonFormatter().formatComplete(run));
        } else if (opts.synthesis) {
          console.log(run.stage3.response);
        } else {
          const { labelToModel, aggregateRankings } = reconstructRunMetadata(run);
          console.log(`Run: ${run.id}`);
          console.log(`Date: ${run.createdAt}`);
          console.log(`Prompt: ${run.prompt.slice(0, 100)}${run.prompt.length > 100 ? '...' : ''}`);
          console.log(`Council: ${run.councilModels.join(', ')}`);
          console.log(`Labels: ${Object.entries(labelToModel).map(([label, model]) => `${label}=${model}`).join(', ')}`);
          console.log(`Rankings: ${aggregateRankings.map((r) => `${r.model}: ${r.averageRank.toFixed(2)} (${r.voteCount} votes)`).join(', ') || 'none'}`);
          for (const note of run.notes ?? []) {
            console.log(`Note: ${note}`);
          }
          console.log(`\nSynthesis (${run.stage3.model}):\n`);
          console.log(run.stage3.response);
        }
        return;
      }

      const runs = await repo.list();
      if (runs.length === 0) {
        console.log('No runs found.');
        return;
      }

      if (opts.json) {
        console.log(JSON.stringify(runs, null, 2));
        return;
      }

      console.log(`\n  ${'ID'.padEnd(38)} ${'Date'.padEnd(22)} ${'Status'.padEnd(22)} Prompt`);
      console.log(`  ${'-'.repeat(38)} ${'-'.repeat(22)} ${'-'.repeat(22)} ${'-'.repeat(40)}`);
      for (const run of runs) {
        const date = new Date(run.createdAt).toLocaleString();
        console.log(`  ${run.id.padEnd(38)} ${date.padEnd(22)} ${run.status.padEnd(22)} ${run.promptPreview}`);
      }
      console.log();
    });
}
