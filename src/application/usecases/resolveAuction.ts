import { z } from "zod";
import { AppError } from "../errors";
import type { AuctionResolution, ResolutionPublisher } from "../ports/services";
import { AUCTION_STRATEGIES, AuctionBuilder } from "../../domain/entities/auction";
import { createBid } from "../../domain/entities/bid";
import { clearingPrice, resolveBids, unitsSold } from "../../domain/services/resolution";
import { log, logError } from "../../infrastructure/logging/logger";

const strategySchema = z.enum(AUCTION_STRATEGIES);

const bidInputSchema = z.object({
  id: z.string().min(1).optional(),
  amount: z.number().int().safe(),
  quantity: z.number().int().safe().nonnegative()
});

export const resolveAuctionInputSchema = z.object({
  lots: z.number().int().safe().nonnegative().optional(),
  reservePrice: z.number().int().safe().optional(),
  strategy: strategySchema.optional(),
  bids: z.array(bidInputSchema)
});

export type ResolveAuctionInput = z.infer<typeof resolveAuctionInputSchema>;

export class ResolveAuctionUseCase {
  constructor(
    private readonly publisher: ResolutionPublisher,
    private readonly maxBids: number
  ) {}

  execute(rawInput: unknown): AuctionResolution {
    const input = this.parse(rawInput);

    const builder = new AuctionBuilder();
    if (input.lots !== undefined) {
      builder.lots(input.lots);
    }
    if (input.reservePrice !== undefined) {
      builder.reservePrice(input.reservePrice);
    }
    if (input.strategy !== undefined) {
      builder.strategy(input.strategy);
    }
    const auction = builder.build();

    const bids = input.bids.map((entry) => createBid(entry.amount, entry.quantity, entry.id));
    const sales = resolveBids(auction, bids);
    const sold = unitsSold(sales);

    const resolution: AuctionResolution = {
      auction,
      sales,
      unitsSold: sold,
      unsoldLots: Math.max(auction.lots - sold, 0),
      clearingPrice: auction.strategy === "single-price" ? clearingPrice(sales) : null
    };

    log("info", "auction.resolved", {
      strategy: auction.strategy,
      lots: auction.lots,
      reservePrice: auction.reservePrice,
      bidCount: bids.length,
      saleCount: sales.length,
      unitsSold: sold
    });

    try {
      this.publisher.publish({ type: "auction:resolved", resolution });
    } catch (error) {
      logError("auction.publish_failed", error, { strategy: auction.strategy });
      throw error;
    }

    return resolution;
  }

  private parse(rawInput: unknown): ResolveAuctionInput {
    const parsed = resolveAuctionInputSchema
      .extend({ bids: resolveAuctionInputSchema.shape.bids.max(this.maxBids) })
      .safeParse(rawInput);
    if (!parsed.success) {
      log("warn", "auction.input_rejected", { issues: parsed.error.issues.length });
      throw new AppError("Invalid auction input", "INVALID_AUCTION_INPUT", parsed.error.issues);
    }

    const seen = new Set<string>();
    for (const entry of parsed.data.bids) {
      if (entry.id === undefined) {
        continue;
      }
      if (seen.has(entry.id)) {
        log("warn", "auction.input_rejected", { duplicateBidId: entry.id });
        throw new AppError(`Duplicate bid id ${entry.id}`, "DUPLICATE_BID_ID");
      }
      seen.add(entry.id);
    }

    return parsed.data;
  }
}
