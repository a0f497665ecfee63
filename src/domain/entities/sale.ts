export interface Sale {
  /** Id of the winning bid. */
  readonly bidderId: string;
  /** Price charged per unit. */
  readonly amount: number;
  readonly quantity: number;
}

export type Sales = readonly Sale[];

export function createSale(bidderId: string, amount: number, quantity: number): Sale {
  return Object.freeze({ bidderId, amount, quantity });
}
