import { expect } from 'chai';
import { CommentStyle } from '../src/models/commentStyle';
import { CommentStyleRegistry } from '../src/services/commentStyleRegistry';
import { UnsupportedLanguageError } from '../src/shared/errors';

describe('CommentStyleRegistry', () => {
  const registry = CommentStyleRegistry.default;

  describe('lookup', () => {
    it('returns line comment rules for python', () => {
      const style = registry.lookup('python');

      expect(style?.comment).to.deep.equal({ kind: 'line', prefix: '#' });
      expect(style?.keepLinePatterns.map((rule) => rule.name)).to.deep.equal(['shebang', 'encoding']);
    });

    it('returns block comment rules for c', () => {
      expect(registry.lookup('c')?.comment).to.deep.equal({
        kind: 'block',
        start: '/*',
        end: ' */',
        bodyPrefix: ' *',
      });
    });

    it('keeps only the shebang for shell scripts', () => {
      expect(registry.lookup('shell')?.keepLinePatterns.map((rule) => rule.name)).to.deep.equal(['shebang']);
    });

    it('returns undefined for unknown languages', () => {
      expect(registry.lookup('cobol')).to.equal(undefined);
    });
  });

  describe('lookupByExtension', () => {
    it('ignores case and the leading dot', () => {
      expect(registry.lookupByExtension('.py')?.languageId).to.equal('python');
      expect(registry.lookupByExtension('PY')?.languageId).to.equal('python');
      expect(registry.lookupByExtension('.TSX')?.languageId).to.equal('javascript');
    });

    it('returns undefined for unregistered extensions', () => {
      expect(registry.lookupByExtension('.txt')).to.equal(undefined);
    });
  });

  describe('require', () => {
    it('throws UnsupportedLanguageError for unknown languages', () => {
      expect(() => registry.require('cobol')).to.throw(UnsupportedLanguageError, 'No comment style registered for "cobol"');
    });
  });

  describe('construction', () => {
    const style = (languageId: string, extensions: string[]): CommentStyle => ({
      languageId,
      name: languageId,
      extensions,
      comment: { kind: 'line', prefix: '#' },
      keepLinePatterns: [],
    });

    it('rejects an extension registered twice', () => {
      expect(() => new CommentStyleRegistry([style('a', ['.x']), style('b', ['.X'])])).to.throw(
        'Extension ".x" registered for both "a" and "b"',
      );
    });

    it('rejects a duplicate language id', () => {
      expect(() => new CommentStyleRegistry([style('a', ['.x']), style('a', ['.y'])])).to.throw(
        'Duplicate language id "a"',
      );
    });

    it('freezes registered styles', () => {
      const frozen = new CommentStyleRegistry([style('a', ['X'])]).require('a');

      expect(Object.isFrozen(frozen)).to.equal(true);
      expect(Object.isFrozen(frozen.comment)).to.equal(true);
      expect(frozen.extensions).to.deep.equal(['.x']);
    });
  });

  it('lists every extension once, sorted', () => {
    const extensions = registry.extensions();

    expect(extensions).to.include.members(['.c', '.java', '.js', '.py', '.sh', '.sql', '.xml']);
    expect([...extensions].sort()).to.deep.equal(extensions);
    expect(new Set(extensions).size).to.equal(extensions.length);
  });
});
