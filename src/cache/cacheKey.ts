import { ReportServiceError } from '../lib/errors';
import type { ReportOption, ReportType } from '../upstream/types';
import { REPORT_OPTIONS } from '../upstream/types';

const isReportOption = (value: string): value is ReportOption =>
  (REPORT_OPTIONS as readonly string[]).includes(value);

/**
 * Canonical option set: lower-cased, deduplicated and sorted, so
 * `summary,info` and `info,summary,info` produce the same key.
 */
export const normalizeOptions = (input: string | readonly string[] | undefined): ReportOption[] => {
  const values = typeof input === 'string' ? input.split(',') : input ?? [];
  const normalized = new Set<ReportOption>();

  for (const raw of values) {
    const value = raw.trim().toLowerCase();
    if (!value) {
      continue;
    }

    if (!isReportOption(value)) {
      throw new ReportServiceError('InvalidInput', `'${value}' is not a supported option`, {
        details: {
          param: 'options',
          help: `Response content and parsing options. Ex: "info,summary" in ${REPORT_OPTIONS.join(', ')}`,
        },
      });
    }

    normalized.add(value);
  }

  return Array.from(normalized).sort();
};

export const buildCacheKey = (
  reportType: ReportType,
  icao: string,
  options: readonly ReportOption[],
): string => `${reportType}:${icao.toUpperCase()}:${[...options].sort().join(',')}`;
