import type { Auction } from "../entities/auction";
import type { Bids } from "../entities/bid";
import { createSale } from "../entities/sale";
import type { Sale } from "../entities/sale";
import { allocateLots } from "./allocation";

/**
 * Uniform-price rule: every winner pays the amount of the lowest accepted
 * bid.
 */
export function singlePrice(auction: Auction, bids: Bids): Sale[] {
  const winners = allocateLots(auction, bids);
  const lowest = winners.at(-1);
  if (!lowest) {
    return [];
  }

  return winners.map((winner) => createSale(winner.id, lowest.amount, winner.quantity));
}
