import { ProxyConfigService } from './proxy-config.service';
import { createTestConfig } from '../../../test/helpers/config';

describe('ProxyConfigService', () => {
  const withGlobalProxy = new ProxyConfigService(
    createTestConfig({ proxy: 'http://proxy.test:8080' }),
  );
  const withoutGlobalProxy = new ProxyConfigService(createTestConfig());

  it('connects directly when the source does not use a proxy', () => {
    expect(withGlobalProxy.resolveProxyUrl('frankfurter', false)).toBeUndefined();
  });

  it('uses the global proxy url for `true`', () => {
    expect(withGlobalProxy.resolveProxyUrl('frankfurter', true)).toBe(
      'http://proxy.test:8080',
    );
  });

  it('prefers a source specific proxy url', () => {
    expect(
      withoutGlobalProxy.resolveProxyUrl('frankfurter', 'http://other.test:3128'),
    ).toBe('http://other.test:3128');
  });

  it('rejects `true` when no global proxy is configured', () => {
    expect(() => withoutGlobalProxy.resolveProxyUrl('exchangerate-api', true)).toThrow(
      'Source exchangerate-api has useProxy enabled but no global proxy url is configured',
    );
  });
});
