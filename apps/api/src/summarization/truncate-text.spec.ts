import { truncateToFit } from './truncate-text';

describe('truncateToFit', () => {
  it('leaves text that fits untouched', () => {
    expect(truncateToFit('short', 5)).toEqual({ text: 'short', truncated: false });
  });

  it('keeps the longest fitting prefix', () => {
    expect(truncateToFit('abcdefgh', 5)).toEqual({ text: 'abcde', truncated: true });
  });

  it('does not split a surrogate pair', () => {
    // "a😀b": the emoji occupies indices 1 and 2
    expect(truncateToFit('a\u{1F600}b', 2)).toEqual({ text: 'a', truncated: true });
    expect(truncateToFit('a\u{1F600}b', 3)).toEqual({
      text: 'a\u{1F600}',
      truncated: true,
    });
  });
});
