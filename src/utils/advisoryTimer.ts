import type { Advisory } from '../types';

/**
 * Schedules `onExpire(advisory.id)` after `delayMs`. The returned function
 * cancels it; callers re-arm whenever the advisory changes so a timer never
 * dismisses a newer message.
 */
export const armDismissTimer = (
  advisory: Advisory | null,
  onExpire: (id: number) => void,
  delayMs: number,
): (() => void) => {
  if (!advisory) return () => undefined;
  const timer = setTimeout(() => onExpire(advisory.id), delayMs);
  return () => clearTimeout(timer);
};
