import { CartSession, toCartResponse } from './cart-session';

describe('CartSession', () => {
  const laptop = { productId: 1, productName: 'Ordinateur portable', unitPrice: 500 };
  const mouse = { productId: 2, productName: 'Souris sans fil', unitPrice: 25 };

  it('starts empty', () => {
    const session = new CartSession('user-1');

    expect(session.isEmpty).toBe(true);
    expect(session.total()).toBe(0);
    expect(toCartResponse(session)).toEqual({ lignes: [], total: 0 });
  });

  it('merges quantities and keeps the first snapshot', () => {
    const session = new CartSession('user-1');
    session.add(laptop, 2);
    const merged = session.add({ ...laptop, productName: 'Renamed', unitPrice: 450 }, 1);

    expect(merged).toEqual({ ...laptop, quantity: 3 });
    expect(session.lines()).toHaveLength(1);
    expect(session.total()).toBe(1500);
  });

  it('hands out copies that cannot alter the cart', () => {
    const session = new CartSession('user-1');
    session.add(laptop, 2);

    const [line] = session.lines();
    line.quantity = 99;

    expect(session.find(laptop.productId)?.quantity).toBe(2);
  });

  it('removes and clears entries', () => {
    const session = new CartSession('user-1');
    session.add(laptop, 1);
    session.add(mouse, 4);

    expect(session.remove(laptop.productId)).toBe(true);
    expect(session.remove(laptop.productId)).toBe(false);
    expect(session.find(laptop.productId)).toBeUndefined();

    session.clear();
    expect(session.isEmpty).toBe(true);
  });

  it('renders lines in insertion order with their totals', () => {
    const session = new CartSession('user-1');
    session.add(mouse, 3);
    session.add(laptop, 1);

    expect(toCartResponse(session)).toEqual({
      lignes: [
        { produit_id: 2, nom_produit: 'Souris sans fil', quantite: 3, prix_unitaire: 25, total_ligne: 75 },
        { produit_id: 1, nom_produit: 'Ordinateur portable', quantite: 1, prix_unitaire: 500, total_ligne: 500 },
      ],
      total: 575,
    });
  });
});
