export const CLOSE_SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'] as const satisfies readonly NodeJS.Signals[];

export interface SignalSource {
  once(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

/** Routes every close signal to `listener`; the returned function unhooks them. */
export function onCloseSignal(listener: () => void, source: SignalSource = process) {
  CLOSE_SIGNALS.forEach((signal) => {
    source.once(signal, listener);
  });
  return () => {
    CLOSE_SIGNALS.forEach((signal) => {
      source.off(signal, listener);
    });
  };
}
