import { describe, it, expect } from 'vitest';
import { injectFragment, buildInjection } from './injection.js';

describe('injectFragment', () => {
  it('inserts before the marker', () => {
    expect(injectFragment('<html><body>Hi</body></html>', '<div>X</div>', '</body>')).toBe(
      '<html><body>Hi<div>X</div></body></html>'
    );
  });

  it('uses the last occurrence of the marker', () => {
    const html = '<body><script>"</body>"</script></body>';
    expect(injectFragment(html, '[T]', '</body>')).toBe('<body><script>"</body>"</script>[T]</body>');
  });

  it('falls back to a case-insensitive match', () => {
    expect(injectFragment('<BODY>x</BODY>', '[T]', '</body>')).toBe('<BODY>x[T]</BODY>');
  });

  it('appends when the marker is missing', () => {
    expect(injectFragment('<p>partial', '[T]', '</body>')).toBe('<p>partial[T]');
  });

  it('appends when the marker is empty', () => {
    expect(injectFragment('abc', '[T]', '')).toBe('abc[T]');
  });

  it('treats regex characters in the marker literally', () => {
    expect(injectFragment('a (END) b', '[T]', '(end)')).toBe('a [T](END) b');
  });
});

describe('buildInjection', () => {
  it('reports the UTF-8 byte length of the new body', () => {
    const result = buildInjection('<body>é</body>', '<i>ü</i>', '</body>', []);
    expect(result.body.toString('utf8')).toBe('<body>é<i>ü</i></body>');
    expect(result.contentLength).toBe(Buffer.byteLength('<body>é<i>ü</i></body>'));
    expect(result.contentLength).toBe(result.body.byteLength);
    expect(result.encodingRemoved).toBe(false);
  });

  it('marks the encoding as removed when codings were stripped', () => {
    expect(buildInjection('<body></body>', 'x', '</body>', ['gzip']).encodingRemoved).toBe(true);
  });
});
