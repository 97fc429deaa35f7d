import readline from 'node:readline';
import type { Controls } from '../game/types';
import type { InputSource } from '../game/Game';

/** `process.stdin`, or any readable stream of key bytes. */
export type KeyStream = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

export interface TerminalInputOptions {
  stdin: KeyStream;
  /** Terminals report no key-up, so a key counts as held this long after its last repeat. */
  holdMs: number;
  now?: () => number;
}

const LEFT_KEYS = new Set(['left', 'a']);
const RIGHT_KEYS = new Set(['right', 'd']);
const RESTART_KEYS = new Set(['return', 'enter']);
const QUIT_KEYS = new Set(['q', 'escape']);

export class TerminalInput implements InputSource {
  private readonly stdin: KeyStream;
  private readonly holdMs: number;
  private readonly now: () => number;
  private lastLeft = Number.NEGATIVE_INFINITY;
  private lastRight = Number.NEGATIVE_INFINITY;
  private restartPressed = false;
  private closing = false;
  private attached = false;

  constructor(options: TerminalInputOptions) {
    this.stdin = options.stdin;
    this.holdMs = options.holdMs;
    this.now = options.now ?? (() => performance.now());
  }

  get closeRequested() {
    return this.closing;
  }

  attach() {
    if (this.attached) return;
    readline.emitKeypressEvents(this.stdin);
    if (this.stdin.isTTY) {
      this.stdin.setRawMode?.(true);
    }
    this.stdin.on('keypress', this.handleKeypress);
    this.stdin.on('end', this.handleEnd);
    this.stdin.resume();
    this.attached = true;
  }

  dispose() {
    if (!this.attached) return;
    this.stdin.off('keypress', this.handleKeypress);
    this.stdin.off('end', this.handleEnd);
    if (this.stdin.isTTY) {
      this.stdin.setRawMode?.(false);
    }
    this.stdin.pause();
    this.attached = false;
  }

  /** Reads the held keys and consumes a pending restart press. */
  snapshot(): Controls {
    const time = this.now();
    const controls = {
      left: time - this.lastLeft <= this.holdMs,
      right: time - this.lastRight <= this.holdMs,
      restart: this.restartPressed,
    };
    this.restartPressed = false;
    return controls;
  }

  private handleEnd = () => {
    this.closing = true;
  };

  handleKeypress = (_input: string | undefined, key: readline.Key | undefined) => {
    if (!key?.name) return;
    const name = key.name;
    if (key.ctrl && name === 'c') {
      this.closing = true;
      return;
    }

    if (LEFT_KEYS.has(name)) {
      this.lastLeft = this.now();
    } else if (RIGHT_KEYS.has(name)) {
      this.lastRight = this.now();
    } else if (RESTART_KEYS.has(name)) {
      this.restartPressed = true;
    } else if (QUIT_KEYS.has(name)) {
      this.closing = true;
    }
  };
}
