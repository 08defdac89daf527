import { describe, it, expect } from 'vitest';
import { extractFrontMatter } from '$lib/parser/front-matter';

describe('extractFrontMatter', () => {
  it('should split a leading YAML block from the content', () => {
    const result = extractFrontMatter('---\ntitle: Home\ntags:\n  - docs\n---\n# Hi\n');

    expect(result.frontMatter).toEqual({ title: 'Home', tags: ['docs'] });
    expect(result.content).toBe('# Hi\n');
  });

  it('should leave documents without a block untouched', () => {
    expect(extractFrontMatter('# Hi')).toEqual({ frontMatter: null, content: '# Hi' });
  });

  it('should only read a block at the very start', () => {
    const source = 'Intro\n---\ntitle: Home\n---\n';
    expect(extractFrontMatter(source)).toEqual({ frontMatter: null, content: source });
  });

  it('should read an empty block as empty metadata', () => {
    expect(extractFrontMatter('---\n---\nBody')).toEqual({ frontMatter: {}, content: 'Body' });
  });

  it('should accept CRLF line endings', () => {
    expect(extractFrontMatter('---\r\ntitle: Home\r\n---\r\nBody')).toEqual({
      frontMatter: { title: 'Home' },
      content: 'Body'
    });
  });

  it('should keep a block that is not a mapping as content', () => {
    const source = '---\nJust a sentence\n---\nMore';
    expect(extractFrontMatter(source)).toEqual({ frontMatter: null, content: source });
  });

  it('should keep a block with invalid YAML as content', () => {
    const source = '---\nkey: [unclosed\n---\nBody';
    expect(extractFrontMatter(source)).toEqual({ frontMatter: null, content: source });
  });
});
