import { writeFile } from 'node:fs/promises';

const DEFAULT_PATH = '/tmp/.worker-healthy';

export async function touchHealthFile(path: string = DEFAULT_PATH): Promise<void> {
  await writeFile(path, new Date().toISOString(), 'utf-8');
}

export interface HealthBeat {
  stop: () => void;
}

/**
 * Rewrites the health file on an interval so a container probe can check
 * its age. Write failures go to `onError` and the beat keeps running.
 */
export function startHealthBeat(
  intervalMs: number = 5000,
  path: string = DEFAULT_PATH,
  onError: (err: unknown) => void = () => undefined,
): HealthBeat {
  const tick = () => {
    touchHealthFile(path).catch(onError);
  };
  tick();
  const timer = setInterval(tick, intervalMs);
  timer.unref();
  return {
    stop: () => clearInterval(timer),
  };
}
