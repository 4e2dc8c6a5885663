import * as path from 'path';
import { expect } from 'chai';
import { CommentStyleRegistry } from '../src/services/commentStyleRegistry';
import { PathService } from '../src/services/pathService';
import { makeTree, removeTrees } from './helpers';

describe('PathService', () => {
  after(removeTrees);

  describe('findPackageRoot', () => {
    it('finds the package from its own sources', () => {
      expect(PathService.findPackageRoot()).to.equal(path.resolve(__dirname, '..'));
    });

    it('locates the built-in templates', () => {
      expect(PathService.builtinTemplatesDir()).to.equal(path.resolve(__dirname, '..', 'templates'));
    });

    it('walks up from a nested directory', () => {
      const root = makeTree({ 'package.json': '{}', 'templates/mit.tmpl': 'x', 'src/deep/file.ts': '' });

      expect(PathService.findPackageRoot(path.join(root, 'src', 'deep'))).to.equal(root);
    });
  });

  describe('discoverFiles', () => {
    it('lists supported files and skips hidden, vendored and backup files', async () => {
      const root = makeTree({
        'a.py': '',
        'D.PY': '',
        'src/b.c': '',
        'notes.unknownext': '',
        'c.py.bak': '',
        'node_modules/pkg/index.js': '',
        '.hidden/z.py': '',
      });

      const files = await PathService.discoverFiles(root, CommentStyleRegistry.default.extensions());

      expect(files).to.deep.equal(['D.PY', 'a.py', 'src/b.c']);
    });
  });

  describe('isExcluded', () => {
    it('matches plain patterns as substrings', () => {
      expect(PathService.isExcluded('src/gen/x.py', ['gen/'])).to.equal(true);
      expect(PathService.isExcluded('src/x.py', ['gen/'])).to.equal(false);
    });

    it('matches slash-free globs against the base name', () => {
      expect(PathService.isExcluded('src/x_pb2.py', ['*_pb2.py'])).to.equal(true);
    });

    it('matches globs with directories against the whole path', () => {
      expect(PathService.isExcluded('vendor/a/b.py', ['vendor/**'])).to.equal(true);
      expect(PathService.isExcluded('src/vendor.py', ['vendor/**'])).to.equal(false);
    });
  });
});
