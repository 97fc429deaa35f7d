import type { HudData, Renderer } from '../game/types';

const PIP_SIZE = 20;
const PIP_SPACING = 30;
const TEXT_SIZE = 20;
const NOTIFICATION_TOP = 130;
const NOTIFICATION_STEP = 25;

export class HUD {
  draw(renderer: Renderer, data: HudData) {
    for (let i = 0; i < data.health; i++) {
      renderer.drawRect(
        { x: 10 + i * PIP_SPACING, y: 10, width: PIP_SIZE, height: PIP_SIZE },
        '#e62937',
      );
    }

    renderer.drawText(`Score: ${data.score}`, { x: 10, y: 40 }, TEXT_SIZE, '#ffffff');
    renderer.drawText(`Difficulty: ${data.difficulty}`, { x: 10, y: 70 }, TEXT_SIZE, '#ffffff');
    if (data.bossCountdown !== null) {
      renderer.drawText(`Next boss: ${data.bossCountdown}`, { x: 10, y: 100 }, TEXT_SIZE, '#ffffff');
    }

    let y = NOTIFICATION_TOP;
    for (const notification of data.notifications) {
      renderer.drawText(notification.text, { x: 10, y }, TEXT_SIZE, '#00e430');
      y += NOTIFICATION_STEP;
    }
  }
}
