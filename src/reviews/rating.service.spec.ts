import { roundRating } from './rating.service';

describe('roundRating', () => {
  it.each([
    [8, 8],
    [7, 7],
    [6.5, 6.5],
    [7.25, 7.3],
    [7.666666, 7.7],
    [5.333333, 5.3],
    [9.96, 10],
  ])('rounds %p to %p', (average, expected) => {
    expect(roundRating(average)).toBe(expected);
  });
});
