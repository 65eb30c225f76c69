import type { IObserver, SwitchboardConfig } from '@switchboard/core';
import { ConsoleObserver } from './console-observer.js';
import { FileObserver } from './file-observer.js';
import { MultiObserver, NoopObserver } from './multi-observer.js';

export type ObservabilityConfig = SwitchboardConfig['observability'];

/**
 * Build the observer described by the `observability` config section.
 * No observers yields a no-op; several are wrapped in a MultiObserver.
 */
export function createObserver(config: ObservabilityConfig): IObserver {
  const observers: IObserver[] = [];

  for (const kind of new Set(config.observers)) {
    switch (kind) {
      case 'console':
        observers.push(new ConsoleObserver(config.logLevel));
        break;
      case 'file':
        observers.push(new FileObserver({ filePath: config.logFile }));
        break;
    }
  }

  if (observers.length === 0) return new NoopObserver();
  if (observers.length === 1 && observers[0]) return observers[0];
  return new MultiObserver(observers);
}
