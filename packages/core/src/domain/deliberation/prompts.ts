import type { AggregateRanking, Stage1Result, Stage2Result } from '../council/stage-results.js';
import type { ChatMessage } from '../../ports/llm-gateway.js';
import { RANKING_ANCHOR } from './ranking.js';

export function buildStage1Messages(userQuery: string): ChatMessage[] {
  return [{ role: 'user', content: userQuery }];
}

export function buildRankingPrompt(userQuery: string, transcript: string): string {
  return `You are evaluating different responses to the following question:

Question: ${userQuery}

Here are the responses from different models (anonymized):

${transcript}

Your task:
1. First, evaluate each response individually. For each response, explain what it does well and what it does poorly.
2. Then, at the very end of your response, provide a final ranking.

IMPORTANT: Your final ranking MUST be formatted EXACTLY as follows:
- Start with the line "${RANKING_ANCHOR}" (all caps, with colon)
- Then list the responses from best to worst as a numbered list
- Each line should be: number, period, space, then ONLY the response label (e.g., "1. Response A")
- Do not add any other text or explanations in the ranking section

Example of the correct format for your ENTIRE response:

Response A provides good detail on X but misses Y...
Response B is accurate but lacks depth on Z...
Response C offers the most comprehensive answer...

${RANKING_ANCHOR}
1. Response C
2. Response A
3. Response B

Now provide your evaluation and ranking:`;
}

export function formatAggregateTable(aggregate: readonly AggregateRanking[]): string {
  if (aggregate.length === 0) {
    return 'No peer rankings could be collected.';
  }
  const rows = aggregate.map(
    (entry, i) => `| ${i + 1} | ${entry.model} | ${entry.averageRank.toFixed(2)} | ${entry.voteCount} |`,
  );
  return ['| Position | Model | Average rank | Votes |', '|---|---|---|---|', ...rows].join('\n');
}

export function buildSynthesisPrompt(
  userQuery: string,
  stage1Results: readonly Stage1Result[],
  stage2Results: readonly Stage2Result[],
  aggregate: readonly AggregateRanking[],
): string {
  const stage1Text = stage1Results
    .map((r) => `Model: ${r.model}\nResponse: ${r.response}`)
    .join('\n\n');
  const stage2Text =
    stage2Results.length > 0
      ? stage2Results.map((r) => `Model: ${r.model}\nRanking: ${r.ranking}`).join('\n\n')
      : 'No peer evaluations are available.';

  return `You are the Chairman of an LLM Council. Multiple AI models have provided responses to a user's question, and then ranked each other's responses.

Original Question: ${userQuery}

STAGE 1 - Individual Responses:
${stage1Text}

STAGE 2 - Peer Rankings:
${stage2Text}

AGGREGATE RANKINGS (lower average rank is better):
${formatAggregateTable(aggregate)}

Your task as Chairman is to synthesize all of this information into a single, comprehensive, accurate answer to the user's original question. Consider:
- The individual responses and their insights
- The peer rankings and what they reveal about response quality
- Any patterns of agreement or disagreement

Provide a clear, well-reasoned final answer that represents the council's collective wisdom:`;
}
