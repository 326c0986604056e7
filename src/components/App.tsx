import React from 'react';
import type { ControlLoop } from '@core/control-loop';
import { useDashboard } from '@hooks/useDashboard';
import { FrameView } from './FrameView';

interface AppProps {
  loop: ControlLoop;
}

/**
 * Main application component. Everything on screen comes from one frame
 * rendered from the control loop's state.
 */
export const App: React.FC<AppProps> = ({ loop }) => {
  const frame = useDashboard(loop);
  return <FrameView frame={frame} />;
};
