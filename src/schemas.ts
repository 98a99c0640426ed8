import { z } from 'zod';
import { isIsoDate } from './utils/shamsiCalendar';

const megabytes = z.number().finite().nonnegative();

const isoDay = z.string().refine((value) => isIsoDate(value), 'expected yyyy-MM-dd');

export const rawDailyRecordSchema = z.object({
  userId: z.string().optional(),
  name: z.string().optional(),
  day: isoDay,
  download: megabytes,
  upload: megabytes,
  totalUsage: megabytes,
});

export const rawUserSchema = z.object({
  userId: z.string().min(1),
  name: z.string().optional(),
  dailyData: z.array(rawDailyRecordSchema),
  summary: z
    .object({
      userId: z.string().optional(),
      totalDownload: megabytes,
      totalUpload: megabytes,
      totalUsage: megabytes,
    })
    .optional(),
});

export const rawReportPayloadSchema = z.object({
  users: z.array(rawUserSchema),
  dateRange: z.object({ startDate: isoDay, endDate: isoDay }),
  monthlyHighestConsumers: z
    .record(
      z.string().regex(/^\d{4}-\d{2}$/, 'expected YYYY-MM'),
      z.object({ userName: z.string(), totalUsage: megabytes }),
    )
    .default({}),
});

export type RawReportPayload = z.infer<typeof rawReportPayloadSchema>;
export type RawUser = z.infer<typeof rawUserSchema>;

export const userNameMapSchema = z.record(z.string(), z.string());

export const totalsSchema = z.object({
  totalDownloadMB: megabytes,
  totalUploadMB: megabytes,
  totalUsageMB: megabytes,
});

export const monthlyAggregateSchema = z.object({
  periodKey: z.string().regex(/^\d{4}-\d{2}$/),
  periodLabel: z.string().min(1),
  shamsiYear: z.number().int(),
  shamsiMonth: z.number().int().min(1).max(12),
  daysCount: z.number().int().nonnegative(),
  totals: totalsSchema,
  highestConsumerName: z.string(),
  highestConsumerUsageMB: megabytes,
});

export const quarterlyAggregateSchema = z.object({
  periodKey: z.string().regex(/^\d{4}-[1-4]$/),
  periodLabel: z.string().min(1),
  shamsiYear: z.number().int(),
  quarter: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]),
  daysCount: z.number().int().nonnegative(),
  totals: totalsSchema,
});
