import type { Logger } from 'pino';
import type { AudioCue } from '../game/types';
import type { TerminalOutput } from './TerminalRenderer';

export interface TerminalAudioOptions {
  output: TerminalOutput;
  logger: Logger;
  minBellIntervalMs?: number;
  now?: () => number;
}

const BELL = '\x07';

/**
 * Explosions and pickups ring the terminal bell. Lasers fire several times a
 * second and stay quiet. Music is tracked as state only and loops on `tick`.
 */
export class TerminalAudio implements AudioCue {
  private readonly output: TerminalOutput;
  private readonly logger: Logger;
  private readonly minBellIntervalMs: number;
  private readonly now: () => number;
  private lastBell = Number.NEGATIVE_INFINITY;
  private musicPlaying = false;

  constructor(options: TerminalAudioOptions) {
    this.output = options.output;
    this.logger = options.logger;
    this.minBellIntervalMs = options.minBellIntervalMs ?? 100;
    this.now = options.now ?? (() => performance.now());
  }

  get isMusicPlaying() {
    return this.musicPlaying;
  }

  playLaser() {}

  playExplosion() {
    this.ring('explosion');
  }

  playUpgrade() {
    this.ring('upgrade');
  }

  playMusic() {
    this.musicPlaying = true;
  }

  stopMusic() {
    this.musicPlaying = false;
  }

  tick() {
    if (!this.musicPlaying) {
      this.playMusic();
    }
  }

  private ring(cue: string) {
    const time = this.now();
    if (time - this.lastBell < this.minBellIntervalMs) return;
    this.lastBell = time;
    try {
      this.output.write(BELL);
    } catch (err) {
      this.logger.warn({ err, cue }, 'audio_cue_failed');
    }
  }
}
