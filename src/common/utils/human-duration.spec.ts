import { parseHumanDuration } from './human-duration';

describe('parseHumanDuration', () => {
  it.each([
    ['30s', 30_000],
    ['5m', 300_000],
    ['2h', 7_200_000],
    ['1d', 86_400_000],
    [' 10 M ', 600_000],
  ])('reads %s', (input, ms) => {
    expect(parseHumanDuration(input)).toBe(ms);
  });

  it.each(['', '5', 'm5', '1w', '1.5h'])('rejects %j', (input) => {
    expect(() => parseHumanDuration(input)).toThrow(RangeError);
  });
});
