// @vitest-environment jsdom
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ExportTable } from '../types';
import { exportService } from './exportService';

const table: ExportTable = {
  title: 'گزارش مصرف اینترنت',
  fileSuffix: 'کلی',
  rows: [['a', 'b']],
};

describe('exportService.csv', () => {
  const originalCreate = URL.createObjectURL;
  const originalRevoke = URL.revokeObjectURL;
  const createObjectURL = vi.fn(() => 'blob:report');
  const revokeObjectURL = vi.fn();

  beforeEach(() => {
    vi.useFakeTimers();
    URL.createObjectURL = createObjectURL;
    URL.revokeObjectURL = revokeObjectURL;
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    createObjectURL.mockClear();
    revokeObjectURL.mockClear();
    URL.createObjectURL = originalCreate;
    URL.revokeObjectURL = originalRevoke;
  });

  it('downloads the file and revokes its URL after the click', () => {
    const downloads: string[] = [];
    vi.spyOn(HTMLElement.prototype, 'click').mockImplementation(function (this: HTMLElement) {
      if (this instanceof HTMLAnchorElement) downloads.push(this.download);
      expect(revokeObjectURL).not.toHaveBeenCalled();
    });

    exportService.csv(table);

    expect(downloads).toEqual(['گزارش-مصرف-اینترنت-کلی.csv']);
    expect(revokeObjectURL).not.toHaveBeenCalled();
    expect(document.querySelectorAll('a')).toHaveLength(0);

    vi.runAllTimers();
    expect(revokeObjectURL).toHaveBeenCalledWith('blob:report');
  });
});
