import React from 'react';
import { render } from 'ink';
import { logger } from '../logger.js';
import { App, type AppProps } from './App.js';

export interface UiSession {
  // Settles when the viewer exits, by keypress or by unmount.
  done: Promise<void>;
  unmount(): void;
}

/**
 * Mount the log viewer. A live viewer owns the terminal, so console output is
 * paused while it is up and restored when it exits; a game that outlives the
 * viewer keeps printing.
 */
export function runUi(opts: AppProps): UiSession {
  const live = opts.live === true;
  if (live) logger.setConsoleOutputEnabled(false);
  const instance = render(<App {...opts} />);
  const done = instance.waitUntilExit().finally(() => {
    if (live) logger.setConsoleOutputEnabled(true);
  });
  return { done, unmount: () => instance.unmount() };
}
