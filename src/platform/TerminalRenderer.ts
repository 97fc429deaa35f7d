import type { Color, Rect, Renderer, Size, Vector2 } from '../game/types';

export interface TerminalOutput {
  write(chunk: string): boolean;
}

export interface TerminalRendererOptions {
  output: TerminalOutput;
  width: number;
  height: number;
  cellWidth?: number;
  cellHeight?: number;
}

interface Cell {
  char: string;
  fg: Color | null;
  bg: Color | null;
}

const ESC = '\x1b[';

const toRgb = (color: Color): [number, number, number] | null => {
  const match = /^#([0-9a-f]{6})$/i.exec(color);
  if (!match) return null;
  const value = parseInt(match[1], 16);
  return [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff];
};

const sgr = (layer: 38 | 48, color: Color | null) => {
  const rgb = color ? toRgb(color) : null;
  if (!rgb) return `${ESC}${layer + 1}m`;
  return `${ESC}${layer};2;${rgb[0]};${rgb[1]};${rgb[2]}m`;
};

/**
 * Maps world coordinates onto a grid of character cells and paints the grid
 * with 24-bit ANSI colours, one full write per frame.
 */
export class TerminalRenderer implements Renderer {
  public readonly columns: number;
  public readonly rows: number;
  private readonly output: TerminalOutput;
  private readonly cellWidth: number;
  private readonly cellHeight: number;
  private cells: Cell[][] = [];

  constructor(options: TerminalRendererOptions) {
    this.output = options.output;
    this.cellWidth = options.cellWidth ?? 10;
    this.cellHeight = options.cellHeight ?? 20;
    this.columns = Math.ceil(options.width / this.cellWidth);
    this.rows = Math.ceil(options.height / this.cellHeight);
    this.beginFrame('#000000');
  }

  open() {
    this.output.write(`${ESC}?1049h${ESC}?25l${ESC}2J`);
  }

  close() {
    this.output.write(`${ESC}0m${ESC}?25h${ESC}?1049l`);
  }

  beginFrame(background: Color) {
    this.cells = Array.from({ length: this.rows }, () =>
      Array.from({ length: this.columns }, () => ({ char: ' ', fg: null, bg: background })),
    );
  }

  endFrame() {
    let frame = `${ESC}H`;
    let fg: Color | null | undefined;
    let bg: Color | null | undefined;
    this.cells.forEach((row, index) => {
      if (index > 0) frame += '\r\n';
      for (const cell of row) {
        if (cell.fg !== fg) {
          fg = cell.fg;
          frame += sgr(38, fg);
        }
        if (cell.bg !== bg) {
          bg = cell.bg;
          frame += sgr(48, bg);
        }
        frame += cell.char;
      }
    });
    frame += `${ESC}0m`;
    this.output.write(frame);
  }

  drawRect(rect: Rect, color: Color) {
    this.forEachCoveredCell(rect, (cell) => {
      cell.char = ' ';
      cell.bg = color;
    });
  }

  strokeRect(rect: Rect, color: Color) {
    const span = this.coveredSpan(rect);
    if (!span) return;
    const { left, right, top, bottom } = span;
    for (let row = top; row <= bottom; row++) {
      for (let col = left; col <= right; col++) {
        const onTop = row === top;
        const onBottom = row === bottom;
        const onLeft = col === left;
        const onRight = col === right;
        if (!onTop && !onBottom && !onLeft && !onRight) continue;
        const cell = this.cellAt(col, row);
        if (!cell) continue;
        cell.fg = color;
        if (onTop && onLeft) cell.char = '┌';
        else if (onTop && onRight) cell.char = '┐';
        else if (onBottom && onLeft) cell.char = '└';
        else if (onBottom && onRight) cell.char = '┘';
        else if (onTop || onBottom) cell.char = '─';
        else cell.char = '│';
      }
    }
  }

  drawCircle(center: Vector2, _radius: number, color: Color) {
    const cell = this.cellAt(
      Math.floor(center.x / this.cellWidth),
      Math.floor(center.y / this.cellHeight),
    );
    if (!cell) return;
    cell.char = '●';
    cell.fg = color;
  }

  drawText(text: string, position: Vector2, _size: number, color: Color) {
    const row = Math.floor(position.y / this.cellHeight);
    const start = Math.round(position.x / this.cellWidth);
    [...text].forEach((char, offset) => {
      const cell = this.cellAt(start + offset, row);
      if (!cell) return;
      cell.char = char;
      cell.fg = color;
    });
  }

  /** Terminal glyphs have one size, so `size` does not change the result. */
  measureText(text: string, _size: number): Size {
    return { width: [...text].length * this.cellWidth, height: this.cellHeight };
  }

  /** Plain characters of the current frame, one string per row. */
  lines(): string[] {
    return this.cells.map((row) => row.map((cell) => cell.char).join(''));
  }

  colorAt(col: number, row: number): { fg: Color | null; bg: Color | null } | null {
    const cell = this.cellAt(col, row);
    return cell ? { fg: cell.fg, bg: cell.bg } : null;
  }

  private cellAt(col: number, row: number): Cell | null {
    if (row < 0 || row >= this.rows || col < 0 || col >= this.columns) return null;
    return this.cells[row][col];
  }

  private coveredSpan(rect: Rect) {
    if (rect.width <= 0 || rect.height <= 0) return null;
    return {
      left: Math.floor(rect.x / this.cellWidth),
      right: Math.ceil((rect.x + rect.width) / this.cellWidth) - 1,
      top: Math.floor(rect.y / this.cellHeight),
      bottom: Math.ceil((rect.y + rect.height) / this.cellHeight) - 1,
    };
  }

  private forEachCoveredCell(rect: Rect, paint: (cell: Cell) => void) {
    const span = this.coveredSpan(rect);
    if (!span) return;
    for (let row = span.top; row <= span.bottom; row++) {
      for (let col = span.left; col <= span.right; col++) {
        const cell = this.cellAt(col, row);
        if (cell) paint(cell);
      }
    }
  }
}
