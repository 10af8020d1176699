import { Order } from '../entities/order.entity';

// Order entity -> wire format
export function toOrderResponse(order: Order) {
  const lines = [...(order.lines ?? [])].sort((a, b) => a.id - b.id);

  return {
    id: order.id,
    fournisseur_id: order.supplierId,
    societe: order.company,
    date_commande: new Date(order.orderDate).toISOString(),
    statut: order.status,
    type: order.orderType,
    cout_total: Number(order.totalCost) || 0,
    details: lines.map((line) => ({
      id: line.id,
      produit_id: line.productId,
      nom_produit: line.productName,
      quantite: line.quantity,
      prix_achat: Number(line.unitPrice) || 0,
    })),
  };
}
