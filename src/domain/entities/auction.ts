export const AUCTION_STRATEGIES = ["single-price", "multi-price"] as const;

export type AuctionStrategy = (typeof AUCTION_STRATEGIES)[number];

export interface Auction {
  readonly lots: number;
  readonly reservePrice: number;
  readonly strategy: AuctionStrategy;
}

export const DEFAULT_LOTS = 1;
export const DEFAULT_RESERVE_PRICE = 0;
export const DEFAULT_STRATEGY: AuctionStrategy = "single-price";

/**
 * Fluent builder for {@link Auction}. Fields left unset fall back to the
 * defaults above. Values are taken as given: negative lots or reserve prices
 * are the caller's concern.
 */
export class AuctionBuilder {
  private lotsValue?: number;
  private reservePriceValue?: number;
  private strategyValue?: AuctionStrategy;

  lots(lots: number): this {
    this.lotsValue = lots;
    return this;
  }

  reservePrice(reservePrice: number): this {
    this.reservePriceValue = reservePrice;
    return this;
  }

  strategy(strategy: AuctionStrategy): this {
    this.strategyValue = strategy;
    return this;
  }

  build(): Auction {
    return Object.freeze({
      lots: this.lotsValue ?? DEFAULT_LOTS,
      reservePrice: this.reservePriceValue ?? DEFAULT_RESERVE_PRICE,
      strategy: this.strategyValue ?? DEFAULT_STRATEGY
    });
  }
}
