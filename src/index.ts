#!/usr/bin/env node
import * as path from 'path';
import * as dotenv from 'dotenv';
import { DryRunCompletionService, GatewayCompletionService, type CompletionService } from './completion.js';
import { loadConfig } from './config.js';
import { ScriptedHumanInput, TerminalHumanInput, type HumanInput } from './humanInput.js';
import { buildGameLedger, formatGameLedger } from './ledger.js';
import { buildTranscriptText, logger } from './logger.js';
import { GameRegistry } from './registry.js';
import { inferSpeakers, loadReplayEntries, resolveReplayPath } from './replay/loadReplay.js';
import { GameModeSchema, type GameConfig, type GameMode } from './types.js';
import { dryRunSeed } from './utils.js';

interface CliArgs {
  configFile: string;
  dryRun: boolean;
  dryRunSeed?: number;
  autoplay: boolean;
  replay?: string;
  ui: boolean;
  mode?: GameMode;
}

function parseArgs(argv: string[]): CliArgs {
  let configFile: string | undefined;
  let dryRun = false;
  let seed: number | undefined;
  let autoplay = false;
  let replay: string | undefined;
  let ui = true;
  let mode: GameMode | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    // npm forwards a literal `--` token; ignore it.
    if (arg === '--') continue;

    if (arg === '--dry-run' || arg === '--dryrun') {
      dryRun = true;
      continue;
    }

    if (arg === '--autoplay') {
      autoplay = true;
      continue;
    }

    if (arg === '--no-ui' || arg === '--no-tui') {
      ui = false;
      continue;
    }

    if (arg === '--seed' || arg === '--dry-run-seed') {
      const next = argv[i + 1];
      if (!next) throw new Error(`Missing value for ${arg}`);
      const n = Number(next);
      if (!Number.isFinite(n)) throw new Error(`Invalid seed "${next}" for ${arg}`);
      seed = n;
      i++;
      continue;
    }

    if (arg === '--replay') {
      const next = argv[i + 1];
      if (!next) throw new Error('Missing value for --replay (a log file or "latest")');
      replay = next;
      i++;
      continue;
    }

    if (arg === '--mode') {
      const parsed = GameModeSchema.safeParse(argv[i + 1]);
      if (!parsed.success) throw new Error(`Invalid value for --mode (expected ${GameModeSchema.options.join(' or ')})`);
      mode = parsed.data;
      i++;
      continue;
    }

    if (arg === '--config') {
      const next = argv[i + 1];
      if (!next) throw new Error('Missing value for --config');
      configFile = next;
      i++;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    // First positional arg is the config file.
    if (!configFile) configFile = arg;
  }

  return { configFile: configFile ?? 'game-config.yaml', dryRun, dryRunSeed: seed, autoplay, replay, ui, mode };
}

async function replay(target: string, ui: boolean) {
  const file = resolveReplayPath(target);
  const entries = loadReplayEntries(file);

  if (!ui) {
    process.stdout.write(buildTranscriptText(entries));
    console.log(`\n${formatGameLedger(buildGameLedger(entries))}`);
    return;
  }

  const { personas, judges } = inferSpeakers(entries);
  const { runUi } = await import('./ui/runUi.js');
  await runUi({ entries, personas, judges, title: `Replay: ${path.basename(file)}` }).done;
}

function createService(config: GameConfig, dryRun: boolean): CompletionService {
  if (dryRun) return new DryRunCompletionService(dryRunSeed());
  return new GatewayCompletionService({
    model: config.model,
    temperature: config.temperature,
    maxOutputTokens: config.max_output_tokens,
  });
}

async function main() {
  // Load local environment variables from .env
  dotenv.config();

  const args = parseArgs(process.argv.slice(2));

  if (args.replay) {
    await replay(args.replay, args.ui);
    return;
  }

  if (args.dryRun) {
    process.env.REVERSE_TURING_DRY_RUN = '1';
    if (args.dryRunSeed !== undefined) process.env.REVERSE_TURING_DRY_RUN_SEED = String(args.dryRunSeed);
  }

  // Fail fast on missing auth for Vercel AI Gateway, except in dry-run mode.
  if (!args.dryRun && !process.env.AI_GATEWAY_API_KEY) {
    throw new Error(
      'Missing AI_GATEWAY_API_KEY. Add it to your .env file to authenticate with Vercel AI Gateway, or run with --dry-run.'
    );
  }

  const loaded = loadConfig(path.resolve(process.cwd(), args.configFile));
  // --mode overrides the file.
  const config: GameConfig = args.mode ? { ...loaded, mode: args.mode } : loaded;
  logger.setPersistenceEnabled(true);
  if (args.dryRun) {
    logger.log({
      type: 'SYSTEM',
      content: `Dry-run mode enabled (seed: ${dryRunSeed()})`,
      metadata: { visibility: 'private' },
    });
  }

  // The live TUI needs the terminal to itself, so only autoplay games get it.
  const liveUi = args.ui && args.autoplay;

  const humanInput: HumanInput = args.autoplay ? new ScriptedHumanInput() : new TerminalHumanInput();
  const registry = new GameRegistry();
  const game = registry.create({
    config,
    service: createService(config, args.dryRun),
    humanInput,
  });

  const ui = liveUi
    ? (await import('./ui/runUi.js')).runUi({
        personas: game.transcript.names,
        judges: game.judges.map(j => j.name),
        live: true,
        gameId: game.id,
      })
    : null;

  try {
    if (!ui) {
      await game.start();
    } else {
      try {
        await Promise.all([game.start(), ui.done]);
      } finally {
        ui.unmount();
      }
    }
  } finally {
    humanInput.close();
    registry.delete(game.id);
  }

  console.log(`\n${formatGameLedger(buildGameLedger(game.state.history))}`);
  if (game.state.abortReason) process.exitCode = 1;
}

main().catch(error => {
  console.error('Fatal Error:', error);
  process.exit(1);
});
