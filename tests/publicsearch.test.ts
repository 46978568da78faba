import { describe, it, expect } from 'vitest';
import { buildSearchUrl, PlaywrightRow, type RowLocator } from '../src/scraper/publicsearch';

describe('buildSearchUrl', () => {
  it('encodes the window, page size and offset into the deed search', () => {
    const url = buildSearchUrl('https://bexar.tx.publicsearch.us/results', {
      window: { startDate: '20160121', endDate: '20260121' },
      offset: 500,
      pageSize: 250,
    });

    expect(url).toBe(
      'https://bexar.tx.publicsearch.us/results?department=RP&docTypes=DEED&limit=250' +
        '&recordedDateRange=20160121%2C20260121&searchType=advancedSearch&sort=desc' +
        '&sortBy=recordedDate&offset=500'
    );
  });

  it('overrides parameters already present on the base URL', () => {
    const url = new URL(
      buildSearchUrl('https://example.publicsearch.us/results?offset=9999&department=OPR', {
        window: { startDate: '20130601', endDate: '20230601' },
        offset: 0,
        pageSize: 250,
      })
    );

    expect(url.searchParams.get('offset')).toBe('0');
    expect(url.searchParams.get('department')).toBe('RP');
    expect(url.searchParams.get('recordedDateRange')).toBe('20130601,20230601');
  });
});

class FakeRowLocator implements RowLocator {
  readonly reads: Array<{ selector: string; timeout?: number }> = [];

  constructor(private readonly cells: Record<string, string>) {}

  locator(selector: string) {
    const text = this.cells[selector];
    return {
      first: () => ({
        count: async () => (text === undefined ? 0 : 1),
        innerText: async (options?: { timeout?: number }) => {
          this.reads.push({ selector, timeout: options?.timeout });
          return text ?? '';
        },
      }),
    };
  }
}

describe('PlaywrightRow', () => {
  it('reads the rendered cell text, keeping stacked names apart', async () => {
    const row = new FakeRowLocator({ 'td.col-3': 'SMITH JOHN\nDOE JANE' });

    expect(await new PlaywrightRow(row).field('col-3')).toBe('SMITH JOHN\nDOE JANE');
    expect(row.reads).toEqual([{ selector: 'td.col-3', timeout: 3000 }]);
  });

  it('falls back to a partial class match, then to a missing cell', async () => {
    const row = new FakeRowLocator({ "td[class*='col-7']": '2024000123' });

    expect(await new PlaywrightRow(row).field('col-7')).toBe('2024000123');
    expect(await new PlaywrightRow(row).field('col-14')).toBeUndefined();
  });
});
