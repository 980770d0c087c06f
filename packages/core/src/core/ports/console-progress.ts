import type { ProgressPort } from './progress.js';

export const silentProgress: ProgressPort = {
  emit: () => undefined
};
