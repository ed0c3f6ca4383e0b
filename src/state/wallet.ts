import type { Position, Side } from "../types";

export interface WalletSnapshot {
  cash: number;
  startingBalance: number;
  totalFeesPaid: number;
  totalTrades: number;
  winningTrades: number;
  positions: Position[];
}

/**
 * Simulated balance sheet: USDC cash plus at most one open position per token.
 * Owned by a single simulation; not safe to share.
 */
export class Wallet {
  private cashBalance: number;
  private readonly positions = new Map<string, Position>();
  private feesPaid = 0;
  private tradeCount = 0;
  private winCount = 0;

  constructor(readonly startingBalance: number) {
    this.cashBalance = startingBalance;
  }

  get cash(): number {
    return this.cashBalance;
  }

  get totalFeesPaid(): number {
    return this.feesPaid;
  }

  get totalTrades(): number {
    return this.tradeCount;
  }

  get winningTrades(): number {
    return this.winCount;
  }

  canAfford(amount: number): boolean {
    return this.cashBalance >= amount;
  }

  /** Returns false and leaves cash unchanged when not affordable. */
  deduct(amount: number): boolean {
    if (!this.canAfford(amount)) return false;
    this.cashBalance -= amount;
    return true;
  }

  credit(amount: number): void {
    this.cashBalance += amount;
  }

  recordFee(fee: number): void {
    this.feesPaid += fee;
  }

  recordTrade(isWinner: boolean): void {
    this.tradeCount += 1;
    if (isWinner) this.winCount += 1;
  }

  /** Cash plus positions marked at `currentPrices` (unknown tokens count as 0). */
  equity(currentPrices: ReadonlyMap<string, number>): number {
    let positionValue = 0;
    for (const [tokenId, pos] of this.positions) {
      positionValue += pos.size * (currentPrices.get(tokenId) ?? 0);
    }
    return this.cashBalance + positionValue;
  }

  pnl(currentPrices: ReadonlyMap<string, number>): number {
    return this.equity(currentPrices) - this.startingBalance;
  }

  winRate(): number {
    if (this.tradeCount === 0) return 0;
    return this.winCount / this.tradeCount;
  }

  getPosition(tokenId: string): Position | null {
    const pos = this.positions.get(tokenId);
    return pos ? { ...pos } : null;
  }

  listPositions(): Position[] {
    return Array.from(this.positions.values(), (p) => ({ ...p }));
  }

  /**
   * Opens a position. Refuses (returns false) while one is already open for
   * the token, so an earlier cost basis is never silently dropped.
   */
  openPosition(tokenId: string, side: Side, size: number, price: number, timestamp: number): boolean {
    if (this.positions.has(tokenId)) return false;
    this.positions.set(tokenId, {
      tokenId,
      side,
      size,
      entryPrice: price,
      entryTime: timestamp,
    });
    return true;
  }

  /** Removes the position, credits size * exitPrice, returns realized PnL. Null if none open. */
  closePosition(tokenId: string, exitPrice: number): number | null {
    const pos = this.positions.get(tokenId);
    if (!pos) return null;
    this.positions.delete(tokenId);

    const pnl =
      pos.side === "BUY"
        ? (exitPrice - pos.entryPrice) * pos.size
        : (pos.entryPrice - exitPrice) * pos.size;
    this.credit(pos.size * exitPrice);
    return pnl;
  }

  snapshot(): WalletSnapshot {
    return {
      cash: this.cashBalance,
      startingBalance: this.startingBalance,
      totalFeesPaid: this.feesPaid,
      totalTrades: this.tradeCount,
      winningTrades: this.winCount,
      positions: this.listPositions(),
    };
  }

  /** Rebuild a wallet from a stored snapshot. */
  static fromSnapshot(snap: WalletSnapshot): Wallet {
    const wallet = new Wallet(snap.startingBalance);
    wallet.cashBalance = snap.cash;
    wallet.feesPaid = snap.totalFeesPaid;
    wallet.tradeCount = snap.totalTrades;
    wallet.winCount = snap.winningTrades;
    for (const p of snap.positions) wallet.positions.set(p.tokenId, { ...p });
    return wallet;
  }
}
