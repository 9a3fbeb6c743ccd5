import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DEFAULT_DOCUMENT_ROOT, loadServerConfigFromText, stripPort } from '../../../../src/core/config/loader.ts';

const SOURCE = '/etc/httpd/conf/httpd.conf';

const load = (lines: string[], warnings: string[] = []) =>
  loadServerConfigFromText(lines.join('\n'), SOURCE, { onWarning: (message) => warnings.push(message) });

describe('loadServerConfigFromText', () => {
  it('should build main server, virtual hosts and location sections', () => {
    const result = load([
      'DocumentRoot "/usr/local/htdocs"',
      'EnableDocumentRootLayers On',
      'DocumentRootLayers layered/christmas layered/promotions',
      '<VirtualHost *:80>',
      '    ServerName one.example.com',
      '</VirtualHost>',
      '<VirtualHost *:80>',
      '    ServerName two.example.com',
      '    ServerAlias www.two.example.com',
      '    DocumentRoot "/usr/local/vhost2"',
      '    EnableDocumentRootLayers Off',
      '    <LocationMatch "\\.png$">',
      '        EnableDocumentRootLayers On',
      '        DocumentRootLayers images_v3 images_v2',
      '    </LocationMatch>',
      '</VirtualHost>',
    ]);

    assert.ok(result.ok);
    if (!result.ok) return;
    const { main, virtualHosts } = result.val;

    assert.strictEqual(main.documentRoot, '/usr/local/htdocs');
    assert.deepStrictEqual(main.effective, {
      enabled: true,
      layers: ['layered/christmas', 'layered/promotions'],
    });

    assert.strictEqual(virtualHosts.length, 2);
    const [one, two] = virtualHosts;
    assert.ok(one && two);
    if (!one || !two) return;

    assert.strictEqual(one.serverName, 'one.example.com');
    assert.strictEqual(one.documentRoot, '/usr/local/htdocs');
    assert.deepStrictEqual(one.effective, main.effective);

    assert.strictEqual(two.serverName, 'two.example.com');
    assert.deepStrictEqual(two.serverAliases, ['www.two.example.com']);
    assert.strictEqual(two.documentRoot, '/usr/local/vhost2');
    assert.deepStrictEqual(two.effective, {
      enabled: false,
      layers: ['layered/christmas', 'layered/promotions'],
    });

    assert.strictEqual(two.locations.length, 1);
    const section = two.locations[0];
    assert.ok(section);
    if (!section) return;
    assert.strictEqual(section.match.type, 'regex');
    if (section.match.type === 'regex') {
      assert.strictEqual(section.match.pattern.source, '\\.png$');
    }
    assert.deepStrictEqual(section.local, { enabled: true, layers: ['images_v3', 'images_v2'] });
  });

  it('should accumulate within a scope and replace across scopes', () => {
    const result = load([
      'DocumentRootLayers a',
      'DocumentRootLayers b',
      '<VirtualHost *:80>',
      'DocumentRootLayers c',
      '</VirtualHost>',
    ]);

    assert.ok(result.ok);
    if (!result.ok) return;
    assert.deepStrictEqual(result.val.main.local.layers, ['a', 'b']);
    assert.deepStrictEqual(result.val.virtualHosts[0]?.effective.layers, ['c']);
  });

  it('should reject DocumentRootLayers inside <Directory>', () => {
    const result = load(['<Directory "/srv/www">', '    DocumentRootLayers alt', '</Directory>']);

    assert.ok(!result.ok);
    if (result.ok) return;
    assert.strictEqual(result.err.type, 'DirectiveContextError');
    assert.strictEqual(
      result.err.message,
      '/etc/httpd/conf/httpd.conf:2: DocumentRootLayers not allowed within <Directory ...>',
    );
  });

  it('should accept DocumentRootLayers inside <VirtualHost>', () => {
    const result = load(['<VirtualHost *:80>', '    DocumentRootLayers alt', '</VirtualHost>']);

    assert.ok(result.ok);
  });

  it('should reject an invalid EnableDocumentRootLayers value', () => {
    const result = load(['EnableDocumentRootLayers Maybe']);

    assert.ok(!result.ok);
    if (result.ok) return;
    assert.strictEqual(result.err.type, 'InvalidDirectiveValueError');
    assert.strictEqual(result.err.message, '/etc/httpd/conf/httpd.conf:1: EnableDocumentRootLayers On|Off, not Maybe');
  });

  it('should ignore unrelated directives inside <Directory>', () => {
    const result = load(['<Directory /srv/www>', 'Options Indexes', '</Directory>']);

    assert.ok(result.ok);
    if (!result.ok) return;
    assert.deepStrictEqual(result.val.main.effective, { enabled: false, layers: [] });
  });

  it('should treat other sections as part of the enclosing scope', () => {
    const result = load(['<IfModule mod_layers.c>', 'EnableDocumentRootLayers On', 'DocumentRootLayers a', '</IfModule>']);

    assert.ok(result.ok);
    if (!result.ok) return;
    assert.deepStrictEqual(result.val.main.effective, { enabled: true, layers: ['a'] });
  });

  describe('DocumentRoot resolution', () => {
    it('should default to the httpd document root', () => {
      const result = load([]);

      assert.ok(result.ok);
      if (!result.ok) return;
      assert.strictEqual(result.val.main.documentRoot, DEFAULT_DOCUMENT_ROOT);
    });

    it('should resolve a relative DocumentRoot against ServerRoot', () => {
      const result = load(['ServerRoot /opt/httpd', 'DocumentRoot htdocs/']);

      assert.ok(result.ok);
      if (!result.ok) return;
      assert.strictEqual(result.val.main.documentRoot, '/opt/httpd/htdocs');
    });

    it('should resolve against the config directory when ServerRoot is absent', () => {
      const result = load(['DocumentRoot htdocs']);

      assert.ok(result.ok);
      if (!result.ok) return;
      assert.strictEqual(result.val.main.documentRoot, '/etc/httpd/conf/htdocs');
    });

    it('should resolve a relative ServerRoot against the config directory', () => {
      const result = load(['ServerRoot ..', 'DocumentRoot www']);

      assert.ok(result.ok);
      if (!result.ok) return;
      assert.strictEqual(result.val.main.documentRoot, '/etc/httpd/www');
    });
  });

  describe('section placement', () => {
    it('should reject <VirtualHost> inside <Location>', () => {
      const result = load(['<Location /a>', '<VirtualHost *:80>', '</VirtualHost>', '</Location>']);

      assert.ok(!result.ok);
      if (result.ok) return;
      assert.strictEqual(result.err.type, 'DirectiveSyntaxError');
      assert.strictEqual(
        result.err.message,
        '/etc/httpd/conf/httpd.conf:2: <VirtualHost> cannot occur within <Location> section',
      );
    });

    it('should reject <Location ~> without a pattern', () => {
      const result = load(['<Location ~>', '</Location>']);

      assert.ok(!result.ok);
      if (result.ok) return;
      assert.strictEqual(
        result.err.message,
        '/etc/httpd/conf/httpd.conf:1: <Location> directive requires additional arguments',
      );
    });

    it('should reject a location pattern that does not compile', () => {
      const result = load(['<LocationMatch "(">', '</LocationMatch>']);

      assert.ok(!result.ok);
      if (result.ok) return;
      assert.strictEqual(result.err.type, 'DirectiveSyntaxError');
      assert.ok(
        result.err.message.startsWith('/etc/httpd/conf/httpd.conf:1: Regular expression could not be compiled: '),
      );
    });

    it('should build prefix and regex matchers for <Location>', () => {
      const result = load(['<Location /promo>', '</Location>', '<Location ~ "^/img/">', '</Location>']);

      assert.ok(result.ok);
      if (!result.ok) return;
      const [prefix, regex] = result.val.main.locations;
      assert.deepStrictEqual(prefix?.match, { type: 'prefix', prefix: '/promo' });
      assert.strictEqual(regex?.match.type, 'regex');
    });

    it('should treat a leading (?i) as a case-insensitive flag', () => {
      const result = load(['<LocationMatch "(?i)\\.png$">', '</LocationMatch>']);

      assert.ok(result.ok);
      if (!result.ok) return;
      const [section] = result.val.main.locations;
      if (section === undefined || section.match.type !== 'regex') {
        assert.fail('expected a regex matcher');
      }
      assert.strictEqual(section.match.pattern.source, '\\.png$');
      assert.strictEqual(section.match.pattern.flags, 'i');
      assert.ok(section.match.pattern.test('/img/LOGO.PNG'));
    });

    it('should warn about host directives placed inside <Location>', () => {
      const warnings: string[] = [];
      const result = load(['<Location /a>', 'DocumentRoot /x', '</Location>'], warnings);

      assert.ok(result.ok);
      if (!result.ok) return;
      assert.deepStrictEqual(warnings, ['/etc/httpd/conf/httpd.conf:2: DocumentRoot is not allowed here, ignored']);
      assert.strictEqual(result.val.main.documentRoot, DEFAULT_DOCUMENT_ROOT);
    });
  });

  it('should freeze the loaded configuration', () => {
    const result = load(['DocumentRootLayers a']);

    assert.ok(result.ok);
    if (!result.ok) return;
    assert.ok(Object.isFrozen(result.val.main));
    assert.ok(Object.isFrozen(result.val.main.effective));
    assert.ok(Object.isFrozen(result.val.main.local.layers));
  });
});

describe('stripPort', () => {
  it('should drop the port from host names', () => {
    assert.strictEqual(stripPort('example.com:8080'), 'example.com');
    assert.strictEqual(stripPort('example.com'), 'example.com');
    assert.strictEqual(stripPort('[::1]:8080'), '[::1]');
  });
});
