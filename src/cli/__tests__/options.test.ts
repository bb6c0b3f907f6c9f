import { RawReportOptions, parseCount, parsePort, parseReportOptions } from '../options';

function raw(overrides: Partial<RawReportOptions> = {}): RawReportOptions {
  return { limit: '20', domains: '10', paths: '5', days: '7', ignore: true, ...overrides };
}

describe('parseReportOptions', () => {
  it('should apply defaults and show history when no section is chosen', () => {
    const config = parseReportOptions(raw(), ['youtube.com']);

    expect(config).toEqual({
      limit: 20,
      domainLimit: 10,
      pathLimit: 5,
      days: 7,
      sections: { history: true, domains: false, hierarchical: false, hourly: false, daily: false },
      filter: { keyword: '', domain: '', from: null, to: null, ignoreDomains: ['youtube.com'] },
      format: 'text',
      outputFile: null,
    });
  });

  it('should not add history when another section is chosen', () => {
    const { sections } = parseReportOptions(raw({ hourly: true, domainStats: true }), []);

    expect(sections).toEqual({ history: false, domains: true, hierarchical: false, hourly: true, daily: false });
  });

  it('should select every section with --all', () => {
    const { sections } = parseReportOptions(raw({ all: true }), []);

    expect(Object.values(sections).every(Boolean)).toBe(true);
  });

  it('should prefer json over csv over tsv', () => {
    expect(parseReportOptions(raw({ json: true, csv: true }), []).format).toBe('json');
    expect(parseReportOptions(raw({ csv: true, tsv: true }), []).format).toBe('csv');
    expect(parseReportOptions(raw({ tsv: true }), []).format).toBe('tsv');
  });

  it('should build the filter from search options', () => {
    const { filter, outputFile } = parseReportOptions(
      raw({ search: 'github', domain: 'github', from: '2025-01-01', to: '2025-01-31', output: 'out.csv' }),
      []
    );

    expect(filter.keyword).toBe('github');
    expect(filter.domain).toBe('github');
    expect(filter.from).toEqual(new Date(Date.UTC(2025, 0, 1)));
    expect(filter.to).toEqual(new Date(Date.UTC(2025, 0, 31)));
    expect(outputFile).toBe('out.csv');
  });

  it('should drop the ignore list with --no-ignore', () => {
    expect(parseReportOptions(raw({ ignore: false }), ['youtube.com']).filter.ignoreDomains).toEqual([]);
  });

  it('should reject malformed dates', () => {
    expect(() => parseReportOptions(raw({ from: '2025/01/01' }), [])).toThrow(
      'Invalid date format (expected YYYY-MM-DD): 2025/01/01'
    );
    expect(() => parseReportOptions(raw({ to: '2025-02-30' }), [])).toThrow('Invalid date: 2025-02-30');
  });

  it('should reject non-numeric limits', () => {
    expect(() => parseReportOptions(raw({ limit: 'ten' }), [])).toThrow(
      'Invalid value for --limit: ten (expected a non-negative integer)'
    );
  });
});

describe('parseCount', () => {
  it('should accept zero and positive integers', () => {
    expect(parseCount('0', '--days')).toBe(0);
    expect(parseCount('42', '--days')).toBe(42);
  });

  it('should reject negatives and fractions', () => {
    expect(() => parseCount('-1', '--days')).toThrow('Invalid value for --days: -1');
    expect(() => parseCount('1.5', '--days')).toThrow('Invalid value for --days: 1.5');
  });

  it('should reject values beyond the safe integer range', () => {
    expect(parseCount('9007199254740991', '--limit')).toBe(Number.MAX_SAFE_INTEGER);
    expect(() => parseCount('99999999999999999999', '--limit')).toThrow(
      'Invalid value for --limit: 99999999999999999999 (expected a non-negative integer)'
    );
  });
});

describe('parsePort', () => {
  it('should accept ports in range', () => {
    expect(parsePort('8080')).toBe(8080);
  });

  it('should reject ports out of range', () => {
    expect(() => parsePort('0')).toThrow('Invalid value for --port: 0 (expected 1-65535)');
    expect(() => parsePort('70000')).toThrow('Invalid value for --port: 70000 (expected 1-65535)');
  });
});
