import type { Auction } from "../entities/auction";
import type { Bids } from "../entities/bid";
import type { Sale, Sales } from "../entities/sale";
import { multiPrice } from "./multiPrice";
import { singlePrice } from "./singlePrice";

/**
 * Resolves a bid set against an auction. Total over its inputs: no bids,
 * no eligible bids or zero lots all come back as an empty list. Sales are
 * returned in acceptance order, highest bid first.
 */
export function resolveBids(auction: Auction, bids: Bids): Sale[] {
  switch (auction.strategy) {
    case "single-price":
      return singlePrice(auction, bids);
    case "multi-price":
      return multiPrice(auction, bids);
    default: {
      const unknownStrategy: never = auction.strategy;
      return unknownStrategy;
    }
  }
}

export function unitsSold(sales: Sales): number {
  return sales.reduce((total, sale) => total + sale.quantity, 0);
}

/** The shared price of a uniform-price result, or null when nothing sold. */
export function clearingPrice(sales: Sales): number | null {
  const first = sales.at(0);
  return first ? first.amount : null;
}
