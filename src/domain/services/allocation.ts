import type { Auction } from "../entities/auction";
import { withQuantity } from "../entities/bid";
import type { Bid, Bids } from "../entities/bid";
import { rankBids } from "./ranking";

/**
 * Greedy fill shared by every pricing rule. Walks the bids from the highest
 * amount down and hands out lots until the supply runs out or a bid falls
 * below the reserve. A bid that no longer fits is partially filled with
 * whatever is left and ends the scan, so lower bids are never considered
 * after it even if they would fit.
 *
 * Returns the accepted bids, highest first, with their awarded quantities.
 */
export function allocateLots(auction: Auction, bids: Bids): Bid[] {
  let remainingLots = auction.lots;
  const accepted: Bid[] = [];

  for (const candidate of rankBids(bids)) {
    if (candidate.amount < auction.reservePrice) {
      break;
    }
    if (candidate.quantity <= remainingLots) {
      remainingLots -= candidate.quantity;
      accepted.push(candidate);
    } else if (remainingLots > 0) {
      accepted.push(withQuantity(candidate, remainingLots));
      remainingLots = 0;
      break;
    } else {
      break;
    }
  }

  return accepted;
}
