import { escapeHtml, highlightCode } from '../highlight';

describe('highlightCode', () => {
  it('marks up known languages', () => {
    const html = highlightCode('def greet():\n    return 1', 'python');
    expect(html).toContain('<span class="hljs-keyword">def</span>');
    expect(html).toContain('<span class="hljs-number">1</span>');
  });

  it('escapes plain text and unknown languages', () => {
    expect(highlightCode('a < b & c', 'plaintext')).toBe('a &lt; b &amp; c');
    expect(highlightCode('<b>"x"</b>', 'no-such-language')).toBe('&lt;b&gt;&quot;x&quot;&lt;/b&gt;');
  });

  it('returns nothing for empty content', () => {
    expect(highlightCode('', 'python')).toBe('');
  });

  it('escapes every html-significant character', () => {
    expect(escapeHtml(`<a href='x'>&</a>`)).toBe('&lt;a href=&#x27;x&#x27;&gt;&amp;&lt;/a&gt;');
  });
});
