export type TimePeriod = 'today' | 'week' | 'month' | 'year';

export const TIME_PERIODS: readonly TimePeriod[] = ['today', 'week', 'month', 'year'];

export type TimeOfDay = 'Night' | 'Morning' | 'Daytime' | 'Evening';

/** The resource an editor event points at. */
export type EditorTarget = {
  filePath: string;
  projectPath: string;
  projectName?: string | null;
  language?: string | null;
};

export type CodingSession = {
  sessionUuid: string;
  userId: string;
  projectName: string;
  language: string;
  platform: string;
  ideName: string;
  startTime: Date;
  endTime: Date;
  lastModified: Date;
  isDeleted: boolean;
  isSynced: boolean;
  syncedAt: Date | null;
  syncVersion: number;
};

export type LiveSession = {
  sessionUuid: string;
  projectPath: string;
  projectName: string;
  language: string;
  platform: string;
  ideName: string;
  startTime: Date;
  endTime: Date;
};

/** The columns aggregation needs; avoids materialising whole rows. */
export type SessionSpan = {
  startTime: Date;
  endTime: Date;
};

export type SessionFacts = SessionSpan & {
  projectName: string;
  language: string;
};

export type DailySummary = {
  date: string;
  totalSeconds: number;
};

export type HourlyUsage = {
  hour: number;
  seconds: number;
};

export type DailyHourUsage = {
  /** ISO weekday, 1 = Monday. */
  dayOfWeek: number;
  hour: number;
  seconds: number;
};

export type LanguageUsage = {
  language: string;
  seconds: number;
};

export type ProjectUsage = {
  projectName: string;
  seconds: number;
};

export type TimeOfDayUsage = {
  bucket: TimeOfDay;
  seconds: number;
};

export type CodingStreaks = {
  currentStreak: number;
  maxStreak: number;
};

export type SummaryStats = {
  today: number;
  dailyAverage: number;
  thisWeek: number;
  thisMonth: number;
  thisYear: number;
  total: number;
};

export type RecentActivity = {
  days: Array<{ date: string; seconds: number }>;
  totalSeconds: number;
};

export type ActivityCalendar = {
  days: DailySummary[];
  streaks: CodingStreaks & { totalDays: number };
};

export type LiveCounterSnapshot = Record<TimePeriod, number>;

export type TrackerStatus = {
  userActive: boolean;
  lastActivity: string | null;
  liveSessions: Array<{
    sessionUuid: string;
    projectPath: string;
    projectName: string;
    language: string;
    startTime: string;
    endTime: string;
  }>;
  counters: LiveCounterSnapshot;
};

export type ExportSession = {
  sessionUuid: string;
  userId: string;
  projectName: string;
  language: string;
  platform: string;
  ideName: string;
  startTime: string;
  endTime: string;
  lastModified: string;
};

export type ExportData = {
  exportVersion: string;
  exportTime: string;
  totalSessions: number;
  sessions: ExportSession[];
};

export type ImportResult = {
  success: boolean;
  totalInFile: number;
  imported: number;
  skipped: number;
  failed: number;
  errorMessage?: string;
};
