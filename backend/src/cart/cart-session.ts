import { lineTotal, sumLineTotals } from '../common/money';

export interface CartEntry {
  productId: number;
  // Instantanés pris au premier ajout
  productName: string;
  unitPrice: number;
  quantity: number;
}

/**
 * Pending order lines of one user. Stock for every entry has already been
 * reserved in the database; the session only remembers what to restore or
 * to commit.
 */
export class CartSession {
  private readonly entries = new Map<number, CartEntry>();

  constructor(readonly userId: string) {}

  get isEmpty(): boolean {
    return this.entries.size === 0;
  }

  lines(): CartEntry[] {
    return [...this.entries.values()].map((entry) => ({ ...entry }));
  }

  find(productId: number): CartEntry | undefined {
    const entry = this.entries.get(productId);
    return entry ? { ...entry } : undefined;
  }

  add(snapshot: Omit<CartEntry, 'quantity'>, quantity: number): CartEntry {
    const existing = this.entries.get(snapshot.productId);
    if (existing) {
      existing.quantity += quantity;
      return { ...existing };
    }

    const entry: CartEntry = { ...snapshot, quantity };
    this.entries.set(snapshot.productId, entry);
    return { ...entry };
  }

  remove(productId: number): boolean {
    return this.entries.delete(productId);
  }

  clear(): void {
    this.entries.clear();
  }

  total(): number {
    return sumLineTotals(this.lines());
  }
}

export function toCartResponse(session: CartSession) {
  return {
    lignes: session.lines().map((entry) => ({
      produit_id: entry.productId,
      nom_produit: entry.productName,
      quantite: entry.quantity,
      prix_unitaire: entry.unitPrice,
      total_ligne: lineTotal(entry.quantity, entry.unitPrice),
    })),
    total: session.total(),
  };
}
