import { useCallback, useEffect, useRef, useState } from 'react';
import { useApp, useStdout } from 'ink';
import type { ControlLoop } from '@core/control-loop';
import { renderFrame } from '@render/render-frame';
import type { Frame } from '@render/frame';
import { getLogger } from '@utils/logger';
import { useKeyboard } from './useKeyboard';

/** Control loop cadence; fetches run on their own, slower interval */
export const TICK_MS = 50;

/**
 * Drives the control loop from Ink: a fixed tick, an immediate pump on
 * every key, and terminal resizes. Returns the frame to draw.
 */
export const useDashboard = (loop: ControlLoop): Frame => {
  const { stdout } = useStdout();
  const { exit } = useApp();
  const exited = useRef(false);
  const [frame, setFrame] = useState<Frame>(() => renderFrame(loop.state, loop.state.size));

  const pump = useCallback(() => {
    if (exited.current) return;
    const changed = loop.tick(Date.now());
    if (loop.quitRequested) {
      exited.current = true;
      getLogger().info('Quit requested');
      exit();
      return;
    }
    if (changed) setFrame(renderFrame(loop.state, loop.state.size));
  }, [loop, exit]);

  useKeyboard(event => {
    loop.enqueueKey(event);
    pump();
  });

  useEffect(() => {
    const interval = setInterval(pump, TICK_MS);
    return () => clearInterval(interval);
  }, [pump]);

  // Handle terminal resize
  useEffect(() => {
    const handleResize = () => {
      loop.resize({
        columns: stdout?.columns || 80,
        rows: stdout?.rows || 24,
      });
      pump();
    };

    stdout?.on('resize', handleResize);
    return () => {
      stdout?.off('resize', handleResize);
    };
  }, [stdout, loop, pump]);

  useEffect(() => () => loop.stop(), [loop]);

  return frame;
};
