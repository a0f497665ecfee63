import { randomUUID } from "node:crypto";

/** A request to buy `quantity` units at `amount` minor currency units each. */
export interface Bid {
  readonly id: string;
  readonly amount: number;
  readonly quantity: number;
}

export type Bids = readonly Bid[];

export function createBid(amount: number, quantity: number, id: string = randomUUID()): Bid {
  return Object.freeze({ id, amount, quantity });
}

/** Shorthand for building bid lists. */
export function bid(amount: number, quantity: number): Bid {
  return createBid(amount, quantity);
}

/** A new bid at the same amount. Ids are never reused, so it gets its own. */
export function withQuantity(source: Bid, quantity: number): Bid {
  return createBid(source.amount, quantity);
}

// Ranking looks at price only. Identity lives in `id`.
export function compareBids(a: Bid, b: Bid): number {
  return a.amount - b.amount;
}

export function bidsRankEqual(a: Bid, b: Bid): boolean {
  return a.amount === b.amount;
}
