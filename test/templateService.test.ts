import { expect } from 'chai';
import { CommentStyleRegistry } from '../src/services/commentStyleRegistry';
import { TemplateService } from '../src/services/templateService';
import { MissingVariableError } from '../src/shared/errors';
import { inlineTemplate } from './helpers';

describe('TemplateService', () => {
  const registry = CommentStyleRegistry.default;
  const variables = { owner: 'Acme', years: '2024' };

  describe('substitute', () => {
    it('replaces every placeholder', () => {
      expect(TemplateService.substitute('Copyright ${owner} ${years}, ${owner}', variables)).to.equal(
        'Copyright Acme 2024, Acme',
      );
    });

    it('does not expand placeholders inside substituted values', () => {
      expect(TemplateService.substitute('${owner}', { owner: '${years}', years: '2024' })).to.equal('${years}');
    });

    it('leaves malformed placeholders alone', () => {
      expect(TemplateService.substitute('$owner ${ owner } ${}', variables)).to.equal('$owner ${ owner } ${}');
    });

    it('throws MissingVariableError naming the variable', () => {
      let caught: unknown;
      try {
        TemplateService.substitute('Copyright ${owner}', { years: '2024' });
      } catch (error) {
        caught = error;
      }

      expect(caught).to.be.instanceOf(MissingVariableError);
      expect(caught).to.have.property('variable', 'owner');
      expect(caught).to.have.property('message', 'No value for template variable "owner"');
    });

    it('does not resolve names from the object prototype', () => {
      expect(() => TemplateService.substitute('${constructor}', variables)).to.throw(MissingVariableError);
    });
  });

  describe('placeholders', () => {
    it('lists names in order of first use', () => {
      expect(TemplateService.placeholders('${years} ${owner} ${years} ${file_name}')).to.deep.equal([
        'years',
        'owner',
        'file_name',
      ]);
    });
  });

  describe('render', () => {
    it('prefixes a single line for line comment styles', () => {
      const lines = TemplateService.render(inlineTemplate('Copyright ${owner} ${years}'), variables, registry.require('python'));

      expect(lines).to.deep.equal(['# Copyright Acme 2024']);
    });

    it('prefixes blank lines and trims trailing whitespace', () => {
      const template = inlineTemplate('Line one  \n\nLine three\n');

      expect(TemplateService.render(template, variables, registry.require('sql'))).to.deep.equal([
        '-- Line one',
        '--',
        '-- Line three',
      ]);
    });

    it('wraps the body in block delimiters', () => {
      const template = inlineTemplate('Copyright ${owner}\n\nAll rights reserved.\n');

      expect(TemplateService.render(template, variables, registry.require('c'))).to.deep.equal([
        '/*',
        ' * Copyright Acme',
        ' *',
        ' * All rights reserved.',
        ' */',
      ]);
    });

    it('leaves body lines bare when the block style has no prefix', () => {
      const template = inlineTemplate('Copyright Acme\n  indented\n');

      expect(TemplateService.render(template, variables, registry.require('xml'))).to.deep.equal([
        '<!--',
        'Copyright Acme',
        '  indented',
        '-->',
      ]);
    });

    it('accepts CRLF templates', () => {
      const template = inlineTemplate('a\r\nb\r\n');

      expect(TemplateService.render(template, variables, registry.require('python'))).to.deep.equal(['# a', '# b']);
    });

    it('renders the same output for the same input', () => {
      const template = inlineTemplate('Copyright ${owner} ${years}\nLicensed under MIT\n');
      const style = registry.require('java');

      expect(TemplateService.render(template, variables, style)).to.deep.equal(
        TemplateService.render(template, variables, style),
      );
    });
  });
});
