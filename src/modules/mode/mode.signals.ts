/**
 * Process-signal controls (tray stand-in)
 *
 *   SIGUSR2  toggle auto/manual
 *   SIGUSR1  log the current mode and last applied brightness
 *
 * Node uses SIGUSR1 to start the inspector. Once a listener is bound the
 * signal only logs status, so attach a debugger with --inspect at launch.
 */

import type { Logger } from '../../common/logger.js';
import type { ModeState } from './mode.state.js';

type ControlSignal = 'SIGUSR1' | 'SIGUSR2';

export interface SignalSource {
  on(event: ControlSignal, listener: () => void): unknown;
  off(event: ControlSignal, listener: () => void): unknown;
}

export interface ModeSignalOptions {
  mode: ModeState;
  logger: Logger;
  onResumeAuto?: () => void;
}

export function bindModeSignals(source: SignalSource, options: ModeSignalOptions): () => void {
  const { mode, logger, onResumeAuto } = options;

  const onToggle = () => {
    const next = mode.toggle();
    logger.info({ mode: next }, `Brightness mode switched to ${next}`);
    if (next === 'auto') {
      onResumeAuto?.();
    }
  };

  const onStatus = () => {
    logger.info(mode.snapshot(), 'Brightness mode status');
  };

  source.on('SIGUSR2', onToggle);
  source.on('SIGUSR1', onStatus);

  return () => {
    source.off('SIGUSR2', onToggle);
    source.off('SIGUSR1', onStatus);
  };
}
