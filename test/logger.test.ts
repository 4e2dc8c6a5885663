import { expect } from 'chai';
import kleur from 'kleur';
import { Logger } from '../src/shared/utils/logger';

describe('Logger', () => {
  let enabled: boolean;

  before(() => {
    enabled = kleur.enabled;
    kleur.enabled = false;
  });

  after(() => {
    kleur.enabled = enabled;
  });

  it('maps verbosity to a level', () => {
    expect(Logger.levelForVerbosity(0)).to.equal('warn');
    expect(Logger.levelForVerbosity(1)).to.equal('info');
    expect(Logger.levelForVerbosity(2)).to.equal('debug');
    expect(Logger.levelForVerbosity(5)).to.equal('debug');
  });

  it('writes scoped messages at or above its level', () => {
    const lines: string[] = [];
    const logger = new Logger('stamp', 'info', (line) => lines.push(line));

    logger.error('broken');
    logger.info('working');
    logger.debug('details');

    expect(lines).to.deep.equal(['[stamp] broken', '[stamp] working']);
  });

  it('shares level and sink with child loggers', () => {
    const lines: string[] = [];
    const child = new Logger('stamp', 'warn', (line) => lines.push(line)).child('config');

    child.warn('odd value');
    child.info('hidden');

    expect(child.isEnabled('info')).to.equal(false);
    expect(lines).to.deep.equal(['[config] odd value']);
  });
});
