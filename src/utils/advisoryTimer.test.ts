import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { armDismissTimer } from './advisoryTimer';

const advisory = { id: 7, kind: 'warning' as const, text: 'no data' };

describe('armDismissTimer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('dismisses the advisory it was armed for after the delay', () => {
    const onExpire = vi.fn();
    armDismissTimer(advisory, onExpire, 2500);

    vi.advanceTimersByTime(2499);
    expect(onExpire).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(onExpire).toHaveBeenCalledWith(7);
  });

  it('does nothing once cancelled', () => {
    const onExpire = vi.fn();
    const cancel = armDismissTimer(advisory, onExpire, 2500);

    cancel();
    vi.advanceTimersByTime(5000);
    expect(onExpire).not.toHaveBeenCalled();
  });

  it('arms nothing without an advisory', () => {
    const onExpire = vi.fn();
    const cancel = armDismissTimer(null, onExpire, 2500);

    vi.advanceTimersByTime(5000);
    cancel();
    expect(onExpire).not.toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(0);
  });
});
