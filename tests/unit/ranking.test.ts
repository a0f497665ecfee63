import { describe, it, expect } from "vitest";
import { rankBids } from "../../src/domain/services/ranking";
import { makeBid } from "../mocks/bids";

describe("rankBids", () => {
  it("orders by amount desc", () => {
    const bids = [makeBid("b1", 10), makeBid("b2", 30), makeBid("b3", 20)];

    const result = rankBids(bids);

    expect(result.map((bid) => bid.id)).toEqual(["b2", "b3", "b1"]);
  });

  it("keeps input order for equal amounts", () => {
    const bids = [
      makeBid("b1", 10),
      makeBid("b2", 20, 4),
      makeBid("b3", 20, 1),
      makeBid("b4", 10, 2),
      makeBid("b5", 20, 2)
    ];

    const result = rankBids(bids);

    expect(result.map((bid) => bid.id)).toEqual(["b2", "b3", "b5", "b1", "b4"]);
  });

  it("never merges rank-equal bids", () => {
    const bids = [makeBid("b1", 100), makeBid("b2", 100), makeBid("b3", 100)];

    expect(rankBids(bids).map((bid) => bid.id)).toEqual(["b1", "b2", "b3"]);
  });

  it("returns empty array for empty input", () => {
    expect(rankBids([])).toEqual([]);
  });

  it("does not mutate original array", () => {
    const bids = [makeBid("b1", 10), makeBid("b2", 20)];
    const originalOrder = bids.map((b) => b.id);

    rankBids(bids);

    expect(bids.map((b) => b.id)).toEqual(originalOrder);
  });
});
