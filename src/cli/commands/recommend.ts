/**
 * `cadence recommend <file>` — run one decision for a context stored as JSON.
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { InterventionEngine } from '../../engine/intervention-engine.js';
import type { DecisionWithContext } from '../../engine/types.js';
import { loadCommandConfig, parseInteger, type GlobalOptions } from './shared.js';

interface RecommendOptions {
  seed?: number;
  json?: boolean;
}

export function createRecommendCommand(): Command {
  const cmd = new Command('recommend');

  cmd
    .description('Recommend an intervention for the context in a JSON file')
    .argument('<file>', 'Path to a JSON context payload')
    .option('-s, --seed <seed>', 'Seed template choice for reproducible output', parseInteger)
    .option('--json', 'Output as JSON')
    .action(async (file: string, options: RecommendOptions, command: Command) => {
      await recommend(file, options, command.optsWithGlobals<GlobalOptions>());
    });

  return cmd;
}

async function recommend(file: string, options: RecommendOptions, globals: GlobalOptions): Promise<void> {
  const config = loadCommandConfig(globals, {
    recommendation: options.seed !== undefined ? { seed: options.seed } : undefined,
  });

  const path = resolve(file);
  let payload: unknown;
  try {
    payload = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new Error(`Could not read context from ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const engine = await InterventionEngine.create({ config });
  try {
    const result = await engine.decidePayload(payload);
    if (options.json) {
      console.log(JSON.stringify(result.decision, null, 2));
    } else {
      printDecision(result);
    }
  } finally {
    await engine.shutdown();
  }
}

function printDecision({ decision, normalized }: DecisionWithContext): void {
  const ctx = normalized.context;
  console.log(`\n  User: ${ctx.userId} (${normalized.defaulted.length} fields defaulted)`);
  console.log(
    `  Load ${ctx.cognitiveLoad.toFixed(2)} · Energy ${ctx.energyLevel.toFixed(2)} · ` +
      `Stress ${ctx.stressLevel.toFixed(2)} · Focus ${ctx.focusState}\n`,
  );

  if (decision.deferred) {
    console.log(`  Deferred: ${decision.reason}`);
    console.log(`  ${decision.detail}\n`);
    return;
  }

  const { intervention } = decision;
  console.log(`  ${decision.selectedStrategy} (score ${decision.score.toFixed(3)})`);
  console.log(`  ${intervention.message}\n`);
  intervention.actionSteps.forEach((step, i) => {
    console.log(`  ${i + 1}. ${step.description} [${step.timeframe}, ${step.difficulty}]`);
  });
  console.log(`\n  Follow up at ${new Date(decision.timing.followUpAt).toISOString()}\n`);
}
