export interface Totals {
  totalDownloadMB: number;
  totalUploadMB: number;
  totalUsageMB: number;
}

export interface DailyRecord {
  userId: string;
  displayName: string;
  day: string; // yyyy-MM-dd, Gregorian
  downloadMB: number;
  uploadMB: number;
  totalMB: number;
}

export interface UserRecord {
  userId: string;
  displayName: string;
  dailyData: DailyRecord[]; // day descending, as received
  summary: Totals;
}

export interface DateRange {
  startDate: string;
  endDate: string;
}

export interface HighestConsumer {
  userName: string;
  totalUsageMB: number;
}

export interface Dataset {
  users: UserRecord[];
  dateRange: DateRange;
  monthlyHighestConsumers: Record<string, HighestConsumer>;
}

export type Quarter = 1 | 2 | 3 | 4;

export interface MonthlyAggregate {
  periodKey: string; // YYYY-MM, Gregorian
  periodLabel: string; // Shamsi month name
  shamsiYear: number;
  shamsiMonth: number;
  daysCount: number;
  totals: Totals;
  highestConsumerName: string;
  highestConsumerUsageMB: number;
}

export interface QuarterlyAggregate {
  periodKey: string; // shamsiYear-quarter
  periodLabel: string; // season name
  shamsiYear: number;
  quarter: Quarter;
  daysCount: number;
  totals: Totals;
}

export type ReportView =
  | { kind: 'overview' }
  | { kind: 'monthly' }
  | { kind: 'quarterly' }
  | { kind: 'user'; displayName: string };

export type RangePreset = 'week' | 'month' | '3months' | '6months';

export type SortColumn = 'totalUsage' | 'totalDownload' | 'totalUpload';

export type SortOrder =
  | { column: null; direction: null }
  | { column: SortColumn; direction: 'asc' | 'desc' };

export type ChartMode = 'bar' | 'line';

export type MonthlyChartMode = 'totals' | 'highest';

export interface Advisory {
  id: number;
  kind: 'warning' | 'info';
  text: string;
}

export interface ReportViews {
  filtered: Dataset;
  users: UserRecord[]; // sorted per SortOrder
  overviewTotals: Totals;
  maxUserUsageMB: number;
  monthly: MonthlyAggregate[];
  monthlyTotals: Totals;
  quarterly: QuarterlyAggregate[];
  quarterlyTotals: Totals;
}

export type LoadStatus = 'loading' | 'ready' | 'failed';

export interface ReportState {
  status: LoadStatus;
  loadError: string | null;
  dataset: Dataset | null;
  selectedView: ReportView;
  appliedRange: DateRange | null;
  pendingRange: Partial<DateRange> | null;
  preset: RangePreset;
  sortOrder: SortOrder;
  chartMode: ChartMode;
  monthlyChartMode: MonthlyChartMode;
  views: ReportViews | null;
  advisory: Advisory | null;
  nextAdvisoryId: number;
}

export type ExportCell = string | number;

export interface ExportTable {
  title: string;
  fileSuffix: string;
  rows: ExportCell[][];
}
