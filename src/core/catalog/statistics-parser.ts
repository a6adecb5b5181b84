import * as cheerio from 'cheerio';
import type { StatisticValue, StatisticsSnapshot } from '../../types/index.js';
import { HTML_MARKERS, MATCH_RATIOS, STATISTIC_KEYS } from '../../constants/index.js';
import { parseByteSize } from '../../utils/bytes.js';
import { bestMatch } from '../../utils/fuzzy.js';

/**
 * `"621"` → 621, `"1,329"` → 1329, `"657 KB"` → ByteSize; anything else is
 * kept as text (`"152K"`, `"MIT"`).
 */
export function parseStatisticValue(text: string): StatisticValue {
  if (/^\d+$/.test(text)) {
    return Number(text);
  }
  if (/^\d{1,3}(,\d{3})+$/.test(text)) {
    return Number(text.replace(/,/g, ''));
  }
  if (/^\d/.test(text) && /(KB|MB|GB|TB)/.test(text)) {
    return parseByteSize(text) ?? text;
  }
  return text;
}

function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function statisticKey(term: string): string | null {
  return bestMatch(term, STATISTIC_KEYS, MATCH_RATIOS.STRICT);
}

/**
 * Read the `dt`/`dd` pairs of every statistics card. Terms that are not a
 * known statistic and terms with an empty description are skipped; keys are
 * reported in their canonical spelling.
 */
export function parseStatistics(html: string): StatisticsSnapshot {
  const $ = cheerio.load(html);
  const stats: Record<string, StatisticValue> = {};

  $(HTML_MARKERS.STATISTICS_CARD)
    .find('dt')
    .each((_, term) => {
      const key = statisticKey(cleanText($(term).text()));
      if (key === null) {
        return;
      }
      const description = $(term).next('dd');
      const value = description.length > 0 ? cleanText(description.text()) : '';
      if (value !== '') {
        stats[key] = parseStatisticValue(value);
      }
    });
  return stats;
}
