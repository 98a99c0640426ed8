import type { ZodError } from 'zod';
import type { DailyRecord, Dataset, HighestConsumer, UserRecord } from '../types';
import { rawReportPayloadSchema, userNameMapSchema, type RawReportPayload } from '../schemas';
import { config as defaultConfig, type ReportConfig } from '../config';
import { deriveMonthlyHighestConsumers, round2, sumTotals } from '../utils/aggregation';

export class ReportDataError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ReportDataError';
    this.issues = issues;
  }

  static fromZod(error: ZodError): ReportDataError {
    const issues = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return new ReportDataError('Report payload does not match the expected shape', issues);
  }
}

export interface DatasetOptions {
  userNames?: Record<string, string>;
  excludedUserIds?: string[];
}

/**
 * Validates the exported payload and builds the immutable Dataset every view
 * is derived from. Display names are resolved once here.
 */
export const buildDataset = (payload: unknown, options: DatasetOptions = {}): Dataset => {
  const parsed = rawReportPayloadSchema.safeParse(payload);
  if (!parsed.success) throw ReportDataError.fromZod(parsed.error);

  const { userNames = {}, excludedUserIds = [] } = options;
  const excluded = new Set(excludedUserIds);
  const seenNames = new Set<string>();
  const users: UserRecord[] = [];

  parsed.data.users.forEach((raw) => {
    if (excluded.has(raw.userId)) return;

    const displayName = userNames[raw.userId] || raw.name || raw.userId;
    if (seenNames.has(displayName)) {
      console.warn(`[reportData] Duplicate display name "${displayName}" (user ${raw.userId}), keeping the first`);
      return;
    }
    seenNames.add(displayName);

    const dailyData: DailyRecord[] = raw.dailyData.map((d) => {
      const totalMB = round2(d.download + d.upload);
      if (Math.abs(totalMB - d.totalUsage) > 0.01) {
        console.warn(`[reportData] ${raw.userId} ${d.day}: totalUsage ${d.totalUsage} != download + upload, using ${totalMB}`);
      }
      return {
        userId: raw.userId,
        displayName,
        day: d.day,
        downloadMB: d.download,
        uploadMB: d.upload,
        totalMB,
      };
    });

    users.push({ userId: raw.userId, displayName, dailyData, summary: sumTotals(dailyData) });
  });

  // Display names first, so a raw name never shadows another user's display name.
  const resolvedNames = new Map<string, string>();
  users.forEach((u) => resolvedNames.set(u.displayName, u.displayName));
  parsed.data.users.forEach((raw) => {
    const kept = users.find((u) => u.userId === raw.userId);
    if (kept && raw.name && !resolvedNames.has(raw.name)) resolvedNames.set(raw.name, kept.displayName);
  });

  const days = users.flatMap((u) => u.dailyData.map((d) => d.day)).sort();
  const dateRange =
    days.length > 0
      ? { startDate: days[0], endDate: days[days.length - 1] }
      : { ...parsed.data.dateRange };

  return {
    users,
    dateRange,
    monthlyHighestConsumers: mergeHighestConsumers(
      deriveMonthlyHighestConsumers(users),
      parsed.data.monthlyHighestConsumers,
      resolvedNames,
    ),
  };
};

/**
 * Exported entries override derived ones, but only when they name a loaded
 * user. Names are rewritten to display names; equal usage falls back to the
 * display-name tie-break.
 */
const mergeHighestConsumers = (
  derived: Record<string, HighestConsumer>,
  exported: RawReportPayload['monthlyHighestConsumers'],
  resolvedNames: Map<string, string>,
): Record<string, HighestConsumer> => {
  const merged = { ...derived };
  Object.entries(exported).forEach(([monthKey, entry]) => {
    const userName = resolvedNames.get(entry.userName);
    if (userName === undefined) {
      console.warn(`[reportData] Ignoring highest consumer "${entry.userName}" for ${monthKey}: not a loaded user`);
      return;
    }
    const totalUsageMB = round2(entry.totalUsage);
    const current = derived[monthKey];
    if (current && current.totalUsageMB === totalUsageMB && current.userName < userName) return;
    merged[monthKey] = { userName, totalUsageMB };
  });
  return merged;
};

const fetchJson = async (url: string): Promise<unknown> => {
  const res = await fetch(url);
  if (!res.ok) throw new ReportDataError(`Failed to fetch ${url} (HTTP ${res.status})`);

  const contentType = res.headers.get('content-type');
  if (contentType && !contentType.includes('json')) {
    throw new ReportDataError(`${url} did not return JSON`);
  }
  return res.json();
};

export const reportDataApi = {
  readEmbedded: (): unknown => (typeof window !== 'undefined' ? window.reportData : undefined),

  fetchUserNames: async (url: string): Promise<Record<string, string>> => {
    try {
      const parsed = userNameMapSchema.safeParse(await fetchJson(url));
      if (parsed.success) return parsed.data;
      console.warn('[reportData] Ignoring malformed user name map:', parsed.error.issues);
    } catch (e) {
      console.warn('[reportData] User name map unavailable, using exported names:', e);
    }
    return {};
  },

  load: async (cfg: ReportConfig = defaultConfig): Promise<Dataset> => {
    const embedded = reportDataApi.readEmbedded();
    const payload = embedded !== undefined ? embedded : await fetchJson(cfg.dataUrl);
    const userNames = cfg.userNamesUrl ? await reportDataApi.fetchUserNames(cfg.userNamesUrl) : {};
    return buildDataset(payload, { userNames, excludedUserIds: cfg.excludedUserIds });
  },
};
