import { z } from 'zod';

const envSchema = z.object({
  VITE_REPORT_DATA_URL: z.string().min(1).default('./report-data.json'),
  VITE_USER_NAMES_URL: z.string().optional(),
  VITE_EXCLUDED_USERS: z.string().default(''),
  VITE_ADVISORY_DISMISS_MS: z.coerce.number().int().positive().default(2500),
});

export interface ReportConfig {
  dataUrl: string;
  userNamesUrl: string | null;
  excludedUserIds: string[];
  advisoryDismissMs: number;
}

export const parseConfig = (env: Record<string, unknown>): ReportConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    console.warn('[config] Invalid environment, falling back to defaults:', parsed.error.flatten().fieldErrors);
  }
  const values = parsed.success ? parsed.data : envSchema.parse({});
  return {
    dataUrl: values.VITE_REPORT_DATA_URL,
    userNamesUrl: values.VITE_USER_NAMES_URL || null,
    excludedUserIds: values.VITE_EXCLUDED_USERS.split(',')
      .map((id) => id.trim())
      .filter(Boolean),
    advisoryDismissMs: values.VITE_ADVISORY_DISMISS_MS,
  };
};

export const config = parseConfig(import.meta.env);
