import 'dotenv/config';
import { loadConfig, type GameConfig } from './config';
import { ConfigError } from './errors';
import { createLogger } from './logger';
import { Game } from './game/Game';
import { World } from './game/World';
import { createRandom } from './game/utils';
import { onCloseSignal } from './platform/signals';
import { SilentAudio } from './platform/SilentAudio';
import { TerminalAudio } from './platform/TerminalAudio';
import { TerminalInput } from './platform/TerminalInput';
import { TerminalRenderer } from './platform/TerminalRenderer';

function readConfig(): GameConfig | null {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      process.stderr.write(`${error.message}\n`);
      return null;
    }
    throw error;
  }
}

async function bootstrap() {
  const config = readConfig();
  if (!config) {
    process.exitCode = 1;
    return;
  }

  const logger = createLogger(config);
  const renderer = new TerminalRenderer({
    output: process.stdout,
    width: config.width,
    height: config.height,
  });
  const input = new TerminalInput({ stdin: process.stdin, holdMs: config.keyHoldMs });
  const audio = config.sound
    ? new TerminalAudio({ output: process.stdout, logger })
    : new SilentAudio();

  const world = new World({
    width: config.width,
    height: config.height,
    audio,
    rng: createRandom(config.seed),
    logger,
  });
  const game = new Game({ world, renderer, input, targetFps: config.targetFps, logger });

  const releaseSignals = onCloseSignal(() => game.stop());

  renderer.open();
  input.attach();
  try {
    await game.run();
  } finally {
    input.dispose();
    renderer.close();
    releaseSignals();
  }
  process.exitCode = 0;
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
  process.exitCode = 1;
});
