import { describe, it } from 'node:test';
import assert from 'node:assert';
import { toDisplayPath } from '../../../../src/cli/utils/display-path.ts';

describe('toDisplayPath', () => {
  it('should shorten paths under the base directory', () => {
    assert.strictEqual(toDisplayPath('/etc/httpd/conf/httpd.conf', '/etc/httpd'), 'conf/httpd.conf');
  });

  it('should keep paths outside the base directory absolute', () => {
    assert.strictEqual(toDisplayPath('/srv/conf/httpd.conf', '/etc/httpd'), '/srv/conf/httpd.conf');
  });

  it('should return . for the base directory itself', () => {
    assert.strictEqual(toDisplayPath('/etc/httpd', '/etc/httpd'), '.');
  });
});
