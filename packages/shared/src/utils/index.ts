/**
 * Dim Sum Journal Ortak Yardimci Fonksiyonlar
 */

const ISO_DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,6})?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * ISO-8601 tarih (veya tarih+saat) metninden takvim gununu cikarir.
 * Ornek: "2024-03-15T12:30:00" -> "2024-03-15"
 *
 * Gecersiz bicim veya olmayan bir gun (2024-02-30) icin null doner.
 */
export function toCalendarDate(value: string): string | null {
  const match = ISO_DATE_PATTERN.exec(value.trim());
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (month < 1 || month > 12 || day < 1) return null;
  if (day > daysInMonth(year, month)) return null;

  if (match[4] !== undefined) {
    const hour = Number(match[4]);
    const minute = Number(match[5]);
    const second = match[6] !== undefined ? Number(match[6]) : 0;
    if (hour > 23 || minute > 59 || second > 59) return null;
  }

  return `${match[1]}-${match[2]}-${match[3]}`;
}

function daysInMonth(year: number, month: number): number {
  // Date.UTC ayi 0 tabanli alir; bir sonraki ayin 0. gunu = bu ayin son gunu
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * LIKE/ILIKE kaliplarindaki ozel karakterleri kacirir
 * Ornek: "50%_off" -> "50\\%\\_off"
 */
export function escapeLikePattern(text: string): string {
  return text.replace(/[\\%_]/g, (char) => `\\${char}`);
}
