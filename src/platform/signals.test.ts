import { EventEmitter } from 'node:events';
import { describe, expect, it, vi } from 'vitest';
import { CLOSE_SIGNALS, onCloseSignal } from './signals';

describe('onCloseSignal', () => {
  it.each(CLOSE_SIGNALS)('requests close on %s', (signal) => {
    const source = new EventEmitter();
    const requestClose = vi.fn();
    onCloseSignal(requestClose, source);

    source.emit(signal);

    expect(requestClose).toHaveBeenCalledTimes(1);
  });

  it('unhooks every signal once disposed', () => {
    const source = new EventEmitter();
    const requestClose = vi.fn();
    const dispose = onCloseSignal(requestClose, source);

    dispose();

    for (const signal of CLOSE_SIGNALS) {
      expect(source.listenerCount(signal)).toBe(0);
    }
    source.emit('SIGINT');
    expect(requestClose).not.toHaveBeenCalled();
  });
});
