import type { Logger } from 'pino';
import { GameOverScreen } from '../ui/GameOverScreen';
import { HUD } from '../ui/HUD';
import type { Controls, Renderer } from './types';
import type { World } from './World';

export interface InputSource {
  readonly closeRequested: boolean;
  snapshot(): Controls;
}

export interface GameOptions {
  world: World;
  renderer: Renderer;
  input: InputSource;
  targetFps: number;
  logger: Logger;
  now?: () => number;
}

/** Paces frames: one world update then one render per tick, until close. */
export class Game {
  public readonly world: World;
  private readonly renderer: Renderer;
  private readonly input: InputSource;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly frameInterval: number;
  private readonly hud = new HUD();
  private readonly gameOverScreen = new GameOverScreen();

  private running = false;
  private lastTime = 0;
  private frames = 0;
  private timer: NodeJS.Timeout | null = null;
  private settle: { resolve: () => void; reject: (error: unknown) => void } | null = null;

  constructor(options: GameOptions) {
    this.world = options.world;
    this.renderer = options.renderer;
    this.input = options.input;
    this.logger = options.logger;
    this.now = options.now ?? (() => performance.now());
    this.frameInterval = 1000 / options.targetFps;
  }

  /** Resolves once the input source asks to close and the loop has stopped. */
  run(): Promise<void> {
    if (this.running) {
      return Promise.reject(new Error('Game loop already running'));
    }
    return new Promise<void>((resolve, reject) => {
      this.settle = { resolve, reject };
      this.running = true;
      this.frames = 0;
      this.world.begin();
      this.lastTime = this.now();
      this.logger.info({ targetFps: 1000 / this.frameInterval }, 'loop_started');
      this.schedule();
    });
  }

  stop() {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.world.audio.stopMusic();
    this.logger.info({ frames: this.frames, score: this.world.score }, 'loop_stopped');
    const settle = this.settle;
    this.settle = null;
    settle?.resolve();
  }

  render() {
    const { renderer, world } = this;
    renderer.beginFrame('#000000');

    if (world.state === 'PLAYING') {
      for (const enemy of world.enemies) enemy.draw(renderer);
      for (const bullet of world.bullets) bullet.draw(renderer);
      for (const upgrade of world.upgrades) upgrade.draw(renderer);
      world.player.draw(renderer);
      this.hud.draw(renderer, world.hud);
    } else {
      this.gameOverScreen.draw(renderer, world.score, world.width, world.height);
    }

    renderer.endFrame();
  }

  private schedule() {
    this.timer = setTimeout(this.loop, this.frameInterval);
  }

  private loop = () => {
    this.timer = null;
    if (!this.running) return;
    if (this.input.closeRequested) {
      this.stop();
      return;
    }

    try {
      const time = this.now();
      const delta = (time - this.lastTime) / 1000;
      this.lastTime = time;
      this.world.update(delta, this.input.snapshot());
      this.render();
      this.frames += 1;
    } catch (error) {
      this.fail(error);
      return;
    }

    this.schedule();
  };

  private fail(error: unknown) {
    this.running = false;
    this.world.audio.stopMusic();
    this.logger.error({ err: error }, 'loop_failed');
    const settle = this.settle;
    this.settle = null;
    settle?.reject(error);
  }
}
