import type { Auction } from "../entities/auction";
import type { Bids } from "../entities/bid";
import { createSale } from "../entities/sale";
import type { Sale } from "../entities/sale";
import { allocateLots } from "./allocation";

/** Pay-as-bid rule: each winner pays its own amount. */
export function multiPrice(auction: Auction, bids: Bids): Sale[] {
  return allocateLots(auction, bids).map((winner) =>
    createSale(winner.id, winner.amount, winner.quantity)
  );
}
