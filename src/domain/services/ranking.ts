import { compareBids } from "../entities/bid";
import type { Bid, Bids } from "../entities/bid";

export function rankBids(bids: Bids): Bid[] {
  // Array.prototype.sort is stable, so equal amounts keep their input order.
  return [...bids].sort((a, b) => compareBids(b, a));
}
