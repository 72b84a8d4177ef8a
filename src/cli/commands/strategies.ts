/**
 * `cadence strategies` — list the strategy catalog and learned weights.
 */

import { Command } from 'commander';
import { InterventionEngine } from '../../engine/intervention-engine.js';
import { describeRule } from '../../strategies/rules.js';
import { MINUTE_MS } from '../../utils/math.js';
import { loadCommandConfig, type GlobalOptions } from './shared.js';

export function createStrategiesCommand(): Command {
  const cmd = new Command('strategies');

  cmd
    .description('List available strategies with their current weights')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      await listStrategies(options, command.optsWithGlobals<GlobalOptions>());
    });

  return cmd;
}

async function listStrategies(options: { json?: boolean }, globals: GlobalOptions): Promise<void> {
  const config = loadCommandConfig(globals);
  const engine = await InterventionEngine.create({ config });

  try {
    const strategies = engine.getCatalog().list();

    if (options.json) {
      const rows = strategies.map((s) => ({
        name: s.name,
        kind: s.kind,
        cognitiveCost: s.cognitiveCost,
        cooldownMinutes: s.cooldownMs / MINUTE_MS,
        weight: s.weight,
        applicability: describeRule(s.applicability),
      }));
      console.log(JSON.stringify(rows, null, 2));
      return;
    }

    console.log(`\n  Strategies (${strategies.length})\n`);
    for (const s of strategies) {
      console.log(
        `  ${s.name.padEnd(26)} ${s.kind.padEnd(22)} cost ${s.cognitiveCost.toFixed(2)}  ` +
          `weight ${s.weight.toFixed(3)}  cooldown ${s.cooldownMs / MINUTE_MS}m`,
      );
      console.log(`  ${''.padEnd(26)} when ${describeRule(s.applicability)}`);
    }
    console.log();
  } finally {
    await engine.shutdown();
  }
}
