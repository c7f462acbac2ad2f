import { parseArgs } from 'node:util';
import { z } from 'zod';
import { MathRandomSource, type RandomSource, SeededRNG } from './dungeon';
import { type GameConfigOverrides, GameOutcome, TurnEngine, resolveGameConfig } from './engine';
import { renderFrame, renderGameOver, renderHelp, renderIntro } from './ui';
import { SCREEN_COLORS, TerminalFrontend } from './terminal';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

interface CliOptions {
  config: GameConfigOverrides;
  seed: number | undefined;
  fast: boolean;
}

const IntegerArg = z.coerce.number().int();

const INTRO_DISPLAY_MS = 1500;
const HELP_DISPLAY_MS = 3000;

function parseCliOptions(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      width: { type: 'string' },
      height: { type: 'string' },
      seed: { type: 'string' },
      fast: { type: 'boolean', default: false },
    },
  });

  const config: GameConfigOverrides = {};
  if (values.width !== undefined) config.width = IntegerArg.parse(values.width);
  if (values.height !== undefined) config.height = IntegerArg.parse(values.height);
  // Validate the merged result up front so bad sizes fail before the terminal is grabbed.
  resolveGameConfig(config);

  return {
    config,
    seed: values.seed === undefined ? undefined : IntegerArg.parse(values.seed),
    fast: values.fast ?? false,
  };
}

// ---------------------------------------------------------------------------
// Bootstrap
// ---------------------------------------------------------------------------

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Command-line entry point.
 *
 * Shows the intro, then plays games until the player quits or declines a
 * restart. Every game gets a brand new state.
 */
async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliOptions(process.argv.slice(2));
  } catch (err: unknown) {
    if (err instanceof z.ZodError) {
      console.error('[main] Invalid options:', err.issues.map((i) => `${i.path.join('.') || 'value'}: ${i.message}`).join('; '));
    } else {
      console.error('[main] Invalid options:', err instanceof Error ? err.message : err);
    }
    process.exitCode = 1;
    return;
  }

  const rng: RandomSource = options.seed === undefined ? new MathRandomSource() : new SeededRNG(options.seed);
  const engine = new TurnEngine({ config: options.config, rng });
  const frontend = new TerminalFrontend();
  frontend.start();

  try {
    if (!options.fast) {
      frontend.drawScreen(renderIntro(), SCREEN_COLORS.CYAN);
      await sleep(INTRO_DISPLAY_MS);
    }

    for (;;) {
      const state = engine.newGame();
      let message: string | undefined;
      let helpUntil = 0;

      state.events.on('effect', (_effect, text) => {
        message = text;
        helpUntil = 0;
      });
      state.events.on('blocked', (_reason, text) => {
        message = text;
        helpUntil = 0;
      });
      state.events.on('help', () => {
        helpUntil = Date.now() + HELP_DISPLAY_MS;
      });
      state.events.on('frame', (snapshot) => {
        if (Date.now() < helpUntil) {
          frontend.drawScreen(renderHelp(), SCREEN_COLORS.YELLOW);
        } else {
          frontend.drawFrame(renderFrame(snapshot, message));
        }
      });

      frontend.flush();
      const summary = await engine.run(frontend);
      if (summary.quit) break;

      const color = summary.outcome === GameOutcome.WON ? SCREEN_COLORS.GREEN : SCREEN_COLORS.RED;
      frontend.drawScreen([...renderGameOver(summary), '', 'Play again? (y/n)'], color);
      const key = await frontend.waitForKey();
      if (key.toLowerCase() !== 'y') break;
    }
  } finally {
    frontend.stop();
  }

  console.log('Thanks for playing Treasure Hunter!');
}

main().catch((err: unknown) => {
  console.error('[main] Fatal error:', err);
  process.exitCode = 1;
});
