/**
 * Year labels across sources. Downstream exporters read years_detected and
 * base_year unconditionally, so both always have a value.
 */

export interface YearSource {
  years_detected: string[];
  base_year: string;
}

/**
 * Union of all detected years, most recent first.
 */
export function collectYears(sources: YearSource[]): string[] {
  const years = new Set<string>();
  for (const source of sources) {
    for (const year of source.years_detected) {
      const trimmed = year.trim();
      if (trimmed) years.add(trimmed);
    }
  }
  return [...years].sort((a, b) => b.localeCompare(a, undefined, { numeric: true }));
}

/**
 * The first source's base year when it reported one, else the most recent year, else "".
 */
export function resolveBaseYear(sources: YearSource[], years: string[]): string {
  const reported = sources.find((source) => source.base_year.trim() !== '');
  if (reported) return reported.base_year.trim();
  return years[0] ?? '';
}
