export type DateTriple = [year: number, month: number, day: number];

const GREGORIAN_DAYS_BEFORE_MONTH = [0, 31, 59, 90, 120, 151, 181, 212, 243, 273, 304, 334];

export const SHAMSI_MONTH_NAMES = [
  'فروردین', 'اردیبهشت', 'خرداد',
  'تیر', 'مرداد', 'شهریور',
  'مهر', 'آبان', 'آذر',
  'دی', 'بهمن', 'اسفند',
] as const;

const PERSIAN_DIGITS = ['۰', '۱', '۲', '۳', '۴', '۵', '۶', '۷', '۸', '۹'];

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export const isGregorianLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

const gregorianMonthLength = (year: number, month: number): number => {
  if (month === 2) return isGregorianLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
};

// Leap years sit at positions 0, 4, ..., 28 of each 33-year cycle.
export const isShamsiLeapYear = (year: number): boolean => {
  const position = (((year + 1595) % 33) + 33) % 33;
  return position % 4 === 0 && position < 32;
};

export const shamsiMonthLength = (year: number, month: number): number => {
  if (month <= 6) return 31;
  if (month <= 11) return 30;
  return isShamsiLeapYear(year) ? 30 : 29;
};

export const shamsiMonthName = (month: number): string => SHAMSI_MONTH_NAMES[month - 1] ?? '';

/**
 * Gregorian → Shamsi. Counts days from a fixed epoch, then peels off
 * 33-year cycles (12053 days) and 4-year blocks (1461 days).
 */
export const toShamsi = (gy: number, gm: number, gd: number): DateTriple => {
  const gy2 = gm > 2 ? gy + 1 : gy;
  let days =
    355666 +
    365 * gy +
    Math.floor((gy2 + 3) / 4) -
    Math.floor((gy2 + 99) / 100) +
    Math.floor((gy2 + 399) / 400) +
    gd +
    GREGORIAN_DAYS_BEFORE_MONTH[gm - 1];

  let jy = -1595 + 33 * Math.floor(days / 12053);
  days %= 12053;
  jy += 4 * Math.floor(days / 1461);
  days %= 1461;
  if (days > 365) {
    jy += Math.floor((days - 1) / 365);
    days = (days - 1) % 365;
  }

  const jm = days < 186 ? 1 + Math.floor(days / 31) : 7 + Math.floor((days - 186) / 30);
  const jd = 1 + (days < 186 ? days % 31 : (days - 186) % 30);
  return [jy, jm, jd];
};

/** Shamsi → Gregorian; exact inverse of {@link toShamsi}. */
export const fromShamsi = (jy: number, jm: number, jd: number): DateTriple => {
  const year = jy + 1595;
  let days =
    -355668 +
    365 * year +
    Math.floor(year / 33) * 8 +
    Math.floor(((year % 33) + 3) / 4) +
    jd +
    (jm < 7 ? (jm - 1) * 31 : (jm - 7) * 30 + 186);

  let gy = 400 * Math.floor(days / 146097);
  days %= 146097;
  if (days > 36524) {
    days -= 1;
    gy += 100 * Math.floor(days / 36524);
    days %= 36524;
    if (days >= 365) days += 1;
  }
  gy += 4 * Math.floor(days / 1461);
  days %= 1461;
  if (days > 365) {
    gy += Math.floor((days - 1) / 365);
    days = (days - 1) % 365;
  }

  let gd = days + 1;
  let gm = 1;
  while (gm < 12 && gd > gregorianMonthLength(gy, gm)) {
    gd -= gregorianMonthLength(gy, gm);
    gm += 1;
  }
  return [gy, gm, gd];
};

const pad2 = (n: number) => String(n).padStart(2, '0');

export const toIsoDate = ([year, month, day]: DateTriple): string =>
  `${year}-${pad2(month)}-${pad2(day)}`;

/** Parses a strict yyyy-MM-dd string; null when malformed or not a real date. */
export const parseIsoDate = (value: string | null | undefined): DateTriple | null => {
  if (!value) return null;
  const match = value.match(ISO_DATE);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > gregorianMonthLength(year, month)) return null;
  return [year, month, day];
};

export const isIsoDate = (value: string | null | undefined): value is string => parseIsoDate(value) !== null;

export const formatShamsiDate = (gregorianDate: string | null | undefined): string => {
  const parsed = parseIsoDate(gregorianDate);
  if (!parsed) return '';
  const [jy, jm, jd] = toShamsi(...parsed);
  return `${jy}/${pad2(jm)}/${pad2(jd)}`;
};

export const toPersianDigits = (value: number | string | null | undefined): string => {
  if (value === null || value === undefined) return '';
  return String(value).replace(/\d/g, (digit) => PERSIAN_DIGITS[Number(digit)]);
};

// All anchors work on the UTC calendar date of the reference instant.
const utcTriple = (reference: Date): DateTriple => [
  reference.getUTCFullYear(),
  reference.getUTCMonth() + 1,
  reference.getUTCDate(),
];

export const todayIso = (reference: Date = new Date()): string => toIsoDate(utcTriple(reference));

export const startOfShamsiWeek = (reference: Date = new Date()): string => {
  const [year, month, day] = utcTriple(reference);
  const midnight = new Date(Date.UTC(year, month - 1, day));
  // Saturday (6) opens the week.
  const offset = (midnight.getUTCDay() + 1) % 7;
  midnight.setUTCDate(midnight.getUTCDate() - offset);
  return midnight.toISOString().slice(0, 10);
};

export const startOfShamsiMonthsAgo = (monthsAgo: number, reference: Date = new Date()): string => {
  let [jy, jm] = toShamsi(...utcTriple(reference));
  jm -= monthsAgo;
  while (jm < 1) {
    jm += 12;
    jy -= 1;
  }
  return toIsoDate(fromShamsi(jy, jm, 1));
};

export const startOfShamsiMonth = (reference: Date = new Date()): string => startOfShamsiMonthsAgo(0, reference);
