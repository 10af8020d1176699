import { lineTotal, roundAmount, sumLineTotals } from './money';

describe('money', () => {
  it('rounds to two decimals', () => {
    expect(roundAmount(0.1 + 0.2)).toBe(0.3);
    expect(roundAmount(1.234)).toBe(1.23);
    expect(roundAmount(1.236)).toBe(1.24);
  });

  it('computes a line total', () => {
    expect(lineTotal(3, 19.99)).toBe(59.97);
  });

  it('sums line totals before rounding', () => {
    expect(sumLineTotals([
      { quantity: 1, unitPrice: 0.1 },
      { quantity: 1, unitPrice: 0.2 },
    ])).toBe(0.3);
    expect(sumLineTotals([])).toBe(0);
  });
});
