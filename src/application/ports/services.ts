import type { Auction } from "../../domain/entities/auction";
import type { Sale } from "../../domain/entities/sale";

export type AuctionResolution = {
  auction: Auction;
  sales: Sale[];
  unitsSold: number;
  unsoldLots: number;
  /** Uniform price of a single-price result; null for pay-as-bid or when nothing sold. */
  clearingPrice: number | null;
};

export type ResolutionEvent = { type: "auction:resolved"; resolution: AuctionResolution };

export interface ResolutionPublisher {
  publish(event: ResolutionEvent): void;
}
