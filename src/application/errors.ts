export type AppErrorCode = "INVALID_AUCTION_INPUT" | "DUPLICATE_BID_ID";

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: AppErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "AppError";
  }
}
