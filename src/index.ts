import { env } from "./config/env";
import { ResolveAuctionUseCase } from "./application/usecases/resolveAuction";
import type { ResolutionPublisher } from "./application/ports/services";

export {
  AUCTION_STRATEGIES,
  AuctionBuilder,
  DEFAULT_LOTS,
  DEFAULT_RESERVE_PRICE,
  DEFAULT_STRATEGY
} from "./domain/entities/auction";
export type { Auction, AuctionStrategy } from "./domain/entities/auction";
export { bid, bidsRankEqual, compareBids, createBid, withQuantity } from "./domain/entities/bid";
export type { Bid, Bids } from "./domain/entities/bid";
export { createSale } from "./domain/entities/sale";
export type { Sale, Sales } from "./domain/entities/sale";
export { rankBids } from "./domain/services/ranking";
export { allocateLots } from "./domain/services/allocation";
export { singlePrice } from "./domain/services/singlePrice";
export { multiPrice } from "./domain/services/multiPrice";
export { clearingPrice, resolveBids, unitsSold } from "./domain/services/resolution";
export { AppError } from "./application/errors";
export type { AppErrorCode } from "./application/errors";
export type {
  AuctionResolution,
  ResolutionEvent,
  ResolutionPublisher
} from "./application/ports/services";
export {
  ResolveAuctionUseCase,
  resolveAuctionInputSchema
} from "./application/usecases/resolveAuction";
export type { ResolveAuctionInput } from "./application/usecases/resolveAuction";

export function createResolveAuction(publisher: ResolutionPublisher): ResolveAuctionUseCase {
  return new ResolveAuctionUseCase(publisher, env.AUCTION_MAX_BIDS);
}
