import type { AudioCue } from '../game/types';

export class SilentAudio implements AudioCue {
  playLaser() {}
  playExplosion() {}
  playUpgrade() {}
  playMusic() {}
  stopMusic() {}
  tick() {}
}
