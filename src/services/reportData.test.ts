import { afterEach, describe, expect, it, vi } from 'vitest';
import type { ReportConfig } from '../config';
import { buildDataset, reportDataApi, ReportDataError } from './reportData';

const payload = () => ({
  users: [
    {
      userId: 'pc-01',
      name: 'Ali',
      dailyData: [
        { userId: 'pc-01', name: 'Ali', day: '2024-03-02', download: 10.5, upload: 2.25, totalUsage: 12.75 },
        { userId: 'pc-01', name: 'Ali', day: '2024-03-01', download: 5, upload: 1, totalUsage: 99 },
      ],
      summary: { userId: 'pc-01', totalDownload: 15.5, totalUpload: 3.25, totalUsage: 18.75 },
    },
    {
      userId: 'pc-02',
      name: 'Sara',
      dailyData: [{ userId: 'pc-02', name: 'Sara', day: '2024-02-10', download: 20, upload: 0, totalUsage: 20 }],
    },
    {
      userId: 'admin',
      name: 'Admin',
      dailyData: [{ day: '2024-04-01', download: 500, upload: 0, totalUsage: 500 }],
    },
  ],
  dateRange: { startDate: '2024-01-01', endDate: '2024-04-30' },
  monthlyHighestConsumers: { '2024-03': { userName: 'Ali', totalUsage: 12.75 } },
});

const testConfig: ReportConfig = {
  dataUrl: './report-data.json',
  userNamesUrl: null,
  excludedUserIds: [],
  advisoryDismissMs: 2500,
};

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
});

describe('buildDataset', () => {
  it('resolves names, drops excluded users and derives summaries', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const dataset = buildDataset(payload(), { userNames: { 'pc-02': 'Sara K.' }, excludedUserIds: ['admin'] });

    expect(dataset.users.map((u) => [u.userId, u.displayName])).toEqual([
      ['pc-01', 'Ali'],
      ['pc-02', 'Sara K.'],
    ]);
    expect(dataset.users[0].summary).toEqual({ totalDownloadMB: 15.5, totalUploadMB: 3.25, totalUsageMB: 18.75 });
    expect(dataset.users[1].dailyData[0].displayName).toBe('Sara K.');
    expect(dataset.dateRange).toEqual({ startDate: '2024-02-10', endDate: '2024-03-02' });
  });

  it('repairs a total that disagrees with download plus upload', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const dataset = buildDataset(payload(), { excludedUserIds: ['admin'] });

    expect(dataset.users[0].dailyData.map((d) => d.totalMB)).toEqual([12.75, 6]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('keeps exported highest consumers and derives the missing months', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const dataset = buildDataset(payload(), { excludedUserIds: ['admin'] });

    expect(dataset.monthlyHighestConsumers).toEqual({
      '2024-02': { userName: 'Sara', totalUsageMB: 20 },
      '2024-03': { userName: 'Ali', totalUsageMB: 12.75 },
    });
  });

  it('drops exported highest consumers that name an excluded user', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const dataset = buildDataset(payload(), { excludedUserIds: ['pc-01', 'admin'], userNames: { 'pc-02': 'Sara K.' } });

    expect(dataset.users.map((u) => u.displayName)).toEqual(['Sara K.']);
    expect(dataset.monthlyHighestConsumers).toEqual({ '2024-02': { userName: 'Sara K.', totalUsageMB: 20 } });
    expect(warn).toHaveBeenCalledWith('[reportData] Ignoring highest consumer "Ali" for 2024-03: not a loaded user');
  });

  it('shows exported highest consumers under their display names', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const dataset = buildDataset(payload(), { excludedUserIds: ['admin'], userNames: { 'pc-01': 'Ali R.' } });

    expect(dataset.monthlyHighestConsumers['2024-03']).toEqual({ userName: 'Ali R.', totalUsageMB: 12.75 });
  });

  it('breaks a tie between exported and derived consumers by display name', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const raw = { ...payload(), monthlyHighestConsumers: { '2024-02': { userName: 'Ali', totalUsage: 20 } } };

    const renamed = buildDataset(raw, { excludedUserIds: ['admin'], userNames: { 'pc-01': 'Zed' } });
    expect(renamed.monthlyHighestConsumers['2024-02']).toEqual({ userName: 'Sara', totalUsageMB: 20 });

    const plain = buildDataset(raw, { excludedUserIds: ['admin'] });
    expect(plain.monthlyHighestConsumers['2024-02']).toEqual({ userName: 'Ali', totalUsageMB: 20 });
  });

  it('keeps the first of two users sharing a display name', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const raw = payload();
    raw.users[1].name = 'Ali';
    const dataset = buildDataset(raw, { excludedUserIds: ['admin'] });

    expect(dataset.users.map((u) => u.userId)).toEqual(['pc-01']);
    expect(warn).toHaveBeenCalledWith('[reportData] Duplicate display name "Ali" (user pc-02), keeping the first');
  });

  it('falls back to the user id and the exported range', () => {
    const dataset = buildDataset({
      users: [{ userId: 'pc-09', dailyData: [] }],
      dateRange: { startDate: '2024-01-01', endDate: '2024-01-31' },
    });

    expect(dataset.users[0].displayName).toBe('pc-09');
    expect(dataset.dateRange).toEqual({ startDate: '2024-01-01', endDate: '2024-01-31' });
    expect(dataset.monthlyHighestConsumers).toEqual({});
  });

  it('rejects a malformed payload with the offending paths', () => {
    expect(() => buildDataset({ users: 'nope' })).toThrow(ReportDataError);

    const raw = payload();
    raw.users[0].dailyData[0].download = -1;
    try {
      buildDataset(raw);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ReportDataError);
      expect(e instanceof ReportDataError && e.issues[0]).toMatch(/^users\.0\.dailyData\.0\.download: /);
    }
  });

  it.each(['2024-02-30', '2024-13-05', '2023-02-29'])('rejects the day %s, which does not exist', (day) => {
    const raw = payload();
    raw.users[1].dailyData[0].day = day;

    expect(() => buildDataset(raw)).toThrow(ReportDataError);
    try {
      buildDataset(raw);
    } catch (e) {
      expect(e instanceof ReportDataError && e.issues).toEqual(['users.1.dailyData.0.day: expected yyyy-MM-dd']);
    }
  });

  it('rejects an exported range ending on a day that does not exist', () => {
    expect(() => buildDataset({ ...payload(), dateRange: { startDate: '2024-01-01', endDate: '2024-04-31' } })).toThrow(
      ReportDataError,
    );
  });
});

describe('reportDataApi.load', () => {
  it('fetches the payload when none is embedded', async () => {
    const fetchMock = vi.fn(async () => jsonResponse(payload()));
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const dataset = await reportDataApi.load(testConfig);

    expect(fetchMock).toHaveBeenCalledWith('./report-data.json');
    expect(dataset.users.map((u) => u.userId)).toEqual(['pc-01', 'pc-02', 'admin']);
  });

  it('prefers the payload embedded in the page', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({}));
    vi.stubGlobal('fetch', fetchMock);
    vi.stubGlobal('window', { reportData: payload() });
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const dataset = await reportDataApi.load({ ...testConfig, excludedUserIds: ['admin'] });

    expect(fetchMock).not.toHaveBeenCalled();
    expect(dataset.users).toHaveLength(2);
  });

  it('applies the optional name map', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async (url: string) => (url === './names.json' ? jsonResponse({ 'pc-01': 'Ali R.' }) : jsonResponse(payload()))),
    );
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const dataset = await reportDataApi.load({ ...testConfig, userNamesUrl: './names.json' });
    expect(dataset.users[0].displayName).toBe('Ali R.');
  });

  it('carries on without names when the map cannot be fetched', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({}, 404)));

    await expect(reportDataApi.fetchUserNames('./names.json')).resolves.toEqual({});
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('reports an HTTP failure', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({}, 404)));

    await expect(reportDataApi.load(testConfig)).rejects.toThrow('Failed to fetch ./report-data.json (HTTP 404)');
  });

  it('rejects a response that is not JSON', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html></html>', { headers: { 'content-type': 'text/html' } })));

    await expect(reportDataApi.load(testConfig)).rejects.toBeInstanceOf(ReportDataError);
  });
});
