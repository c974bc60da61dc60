import { sanitizeUrlForLogging } from './url-sanitizer';

describe('sanitizeUrlForLogging', () => {
  it('redacts secret query parameters', () => {
    expect(
      sanitizeUrlForLogging(
        'https://api.exchangerate.host/live?source=USD&access_key=test-secret',
      ),
    ).toBe('https://api.exchangerate.host/live?source=USD&access_key=REDACTED');
  });

  it('redacts secrets embedded in the path', () => {
    expect(
      sanitizeUrlForLogging(
        'https://v6.exchangerate-api.com/v6/test-secret/latest/USD',
        ['test-secret'],
      ),
    ).toBe('https://v6.exchangerate-api.com/v6/REDACTED/latest/USD');
  });

  it('keeps urls without secrets unchanged', () => {
    expect(
      sanitizeUrlForLogging('https://api.frankfurter.app/latest?from=EUR'),
    ).toBe('https://api.frankfurter.app/latest?from=EUR');
  });

  it('reports unparseable urls', () => {
    expect(sanitizeUrlForLogging('not a url')).toBe('[invalid-url]');
  });
});
