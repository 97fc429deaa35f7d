import type { Color, Renderer } from '../game/types';

export class GameOverScreen {
  draw(renderer: Renderer, score: number, width: number, height: number) {
    const centered = (text: string, size: number, y: (textHeight: number) => number, color: Color) => {
      const measured = renderer.measureText(text, size);
      renderer.drawText(text, { x: width / 2 - measured.width / 2, y: y(measured.height) }, size, color);
    };

    centered('GAME OVER', 60, (textHeight) => height / 2 - textHeight - 40, '#e62937');
    centered(`YOUR SCORE: ${score}`, 30, () => height / 2, '#ffffff');
    centered('Press ENTER to restart', 20, () => height / 2 + 60, '#00e430');
  }
}
