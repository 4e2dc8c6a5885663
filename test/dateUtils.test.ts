import { expect } from 'chai';
import { formatYears, getCurrentYear, mergeYears, parseYears } from '../src/utils/dateUtils';

describe('dateUtils', () => {
  it('returns the current year', () => {
    expect(getCurrentYear()).to.equal(new Date().getFullYear());
  });

  describe('parseYears', () => {
    it('parses a single year', () => {
      expect(parseYears('2019')).to.deep.equal({ start: 2019, end: 2019 });
    });

    it('parses a range with spaces around the dash', () => {
      expect(parseYears(' 2019 - 2021 ')).to.deep.equal({ start: 2019, end: 2021 });
    });

    it('rejects other text', () => {
      expect(parseYears('1850')).to.equal(undefined);
      expect(parseYears('2019, 2021')).to.equal(undefined);
      expect(parseYears('')).to.equal(undefined);
    });
  });

  describe('formatYears', () => {
    it('collapses a one-year range', () => {
      expect(formatYears({ start: 2024, end: 2024 })).to.equal('2024');
    });

    it('joins a range with a dash', () => {
      expect(formatYears({ start: 2019, end: 2024 })).to.equal('2019-2024');
    });
  });

  describe('mergeYears', () => {
    it('extends a single year to a range', () => {
      expect(mergeYears('2019', 2024)).to.equal('2019-2024');
    });

    it('extends the end of a range', () => {
      expect(mergeYears('2019 - 2021', 2024)).to.equal('2019-2024');
    });

    it('keeps a range that already reaches the current year', () => {
      expect(mergeYears('2019-2024', 2024)).to.equal('2019-2024');
      expect(mergeYears('2019-2026', 2024)).to.equal('2019-2026');
    });

    it('keeps a start year in the future', () => {
      expect(mergeYears('2030', 2024)).to.equal('2030');
    });

    it('keeps text it cannot parse', () => {
      expect(mergeYears('since forever', 2024)).to.equal('since forever');
    });
  });
});
