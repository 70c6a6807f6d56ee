import { isMissingMark, MissingMark } from './performance.types';

describe('isMissingMark', () => {
  it('recognises the sentinel', () => {
    expect(isMissingMark(MissingMark)).toBe(true);
  });

  it('treats every number, including 0, as a mark', () => {
    expect(isMissingMark(0)).toBe(false);
    expect(isMissingMark(72.5)).toBe(false);
  });
});
