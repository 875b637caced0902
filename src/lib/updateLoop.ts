type UpdateLoopHandlers = {
  onStart: () => void;
  onStop: () => void;
  // Wall-clock delta since the previous tick, and the same delta in
  // nominal frames at the target rate
  onUpdate: (clockDeltaMs: number, frames: number) => void;
  onPause: () => void;
  getTargetFps: () => number;
};

export type UpdateLoopTimers = {
  now: () => number;
  // Returns a function that cancels the scheduled callback
  schedule: (callback: () => void, delayMs: number) => () => void;
};

const nodeTimers: UpdateLoopTimers = {
  now: () => performance.now(),
  schedule: (callback, delayMs) => {
    const timeout = setTimeout(callback, delayMs);
    return () => clearTimeout(timeout);
  },
};

/**
 * Real-time driver. Node has no animation frames, so ticks are scheduled
 * with timers at the target rate; elapsed wall time is handed over in
 * nominal frames so a late tick moves the simulation further.
 */
export const createUpdateLoop = (
  handlers: UpdateLoopHandlers,
  timers: UpdateLoopTimers = nodeTimers
) => {
  let cancelScheduled: (() => void) | null = null;
  let isRunning = false;
  let isPaused = false;
  let lastFrameTime = timers.now();

  const { onUpdate, onPause, onStop, onStart, getTargetFps } = handlers;

  const frameIntervalMs = () => 1000 / getTargetFps();

  const update = () => {
    cancelScheduled = null;
    if (!isRunning || isPaused) return;
    const currentTime = timers.now();
    const clockDeltaMs = currentTime - lastFrameTime;
    lastFrameTime = currentTime;
    onUpdate(clockDeltaMs, clockDeltaMs / frameIntervalMs());
    // onUpdate may have stopped the loop
    if (isRunning && !isPaused) {
      cancelScheduled = timers.schedule(update, frameIntervalMs());
    }
  };

  const stopUpdating = () => {
    if (cancelScheduled !== null) {
      cancelScheduled();
      cancelScheduled = null;
    }
  };

  const startUpdating = () => {
    if (cancelScheduled !== null) return;
    lastFrameTime = timers.now();
    cancelScheduled = timers.schedule(update, frameIntervalMs());
  };

  const pause = () => {
    if (!isRunning || isPaused) return;
    isPaused = true;
    stopUpdating();
    onPause();
  };

  const start = () => {
    if (isRunning && !isPaused) return;
    isRunning = true;
    isPaused = false;
    startUpdating();
    onStart();
  };

  const stop = () => {
    if (!isRunning) return;
    stopUpdating();
    isRunning = false;
    isPaused = false;
    onStop();
  };

  return {
    pause,
    start,
    stop,
    isRunning: () => isRunning,
    isPaused: () => isPaused,
  };
};

export type UpdateLoop = ReturnType<typeof createUpdateLoop>;
