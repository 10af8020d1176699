// Arrondir à 2 décimales pour éviter les erreurs de précision
export function roundAmount(value: number): number {
  return Math.round(value * 100) / 100;
}

export function lineTotal(quantity: number, unitPrice: number): number {
  return roundAmount(quantity * unitPrice);
}

export function sumLineTotals(lines: ReadonlyArray<{ quantity: number; unitPrice: number }>): number {
  return roundAmount(lines.reduce((sum, line) => sum + line.quantity * line.unitPrice, 0));
}
