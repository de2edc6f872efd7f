import type { Fill } from "./types.js";

export class InsufficientPositionError extends Error {
  public readonly symbol: string;

  public constructor(symbol: string, held: number, requested: number) {
    super(`Not enough ${symbol} to sell: holding ${held}, selling ${requested}`);
    this.name = "InsufficientPositionError";
    this.symbol = symbol;
  }
}

export interface PositionStats {
  readonly symbol: string;
  readonly quantity: number;
  readonly latestClose: number | null;
  readonly pnl: number;
  /** pnl relative to the most cash the position ever tied up. */
  readonly pnlRatio: number;
  readonly maxPnl: number | null;
  readonly minPnl: number | null;
  readonly qtyBought: number;
  readonly qtySold: number;
  readonly valueBought: number;
  readonly valueSold: number;
  readonly cost: number;
  readonly maxCash: number;
  readonly transactions: ReadonlyArray<Fill>;
}

export interface PortfolioStats {
  readonly pnl: number;
  readonly initialCash: number;
  readonly cash: number;
  readonly pnlRatio: number;
  /** Best pnl ratio first. */
  readonly positions: ReadonlyArray<PositionStats>;
}

/**
 * Running statistics for one instrument. Without a market close yet, the
 * open quantity is valued at the average traded price.
 */
export class PositionBook {
  public readonly symbol: string;

  private quantityHeld = 0;
  private latestClose: number | null = null;
  private pnlValue = 0;
  private pnlRatio = 0;
  private maxPnl: number | null = null;
  private minPnl: number | null = null;
  private qtyBought = 0;
  private qtySold = 0;
  private valueBought = 0;
  private valueSold = 0;
  private cost = 0;
  private maxCash = 0;
  private readonly transactions: Fill[] = [];

  public constructor(symbol: string) {
    this.symbol = symbol;
  }

  public get quantity(): number {
    return this.quantityHeld;
  }

  public applyFill(fill: Fill): void {
    const signed = fill.side === "buy" ? fill.quantity : -fill.quantity;
    if (this.quantityHeld + signed < 0) {
      throw new InsufficientPositionError(this.symbol, this.quantityHeld, fill.quantity);
    }
    this.quantityHeld += signed;
    this.transactions.push(fill);
    this.cost += fill.fees;

    const tradedValue = fill.quantity * fill.price;
    if (fill.side === "sell") {
      this.qtySold += fill.quantity;
      this.valueSold += tradedValue;
    } else {
      this.qtyBought += fill.quantity;
      this.valueBought += tradedValue;
      this.maxCash = Math.max(this.maxCash, tradedValue + fill.fees - this.pnlValue);
    }
    this.updatePnl();
  }

  public markToMarket(close: number): void {
    this.latestClose = close;
    this.updatePnl();
  }

  public pnl(): number {
    const mark = this.latestClose ?? this.averagePrice();
    return this.quantityHeld * mark + this.valueSold - this.valueBought - this.cost;
  }

  public marketValue(): number {
    return this.quantityHeld * (this.latestClose ?? this.averagePrice());
  }

  public stats(): PositionStats {
    return {
      symbol: this.symbol,
      quantity: this.quantityHeld,
      latestClose: this.latestClose,
      pnl: this.pnlValue,
      pnlRatio: this.pnlRatio,
      maxPnl: this.maxPnl,
      minPnl: this.minPnl,
      qtyBought: this.qtyBought,
      qtySold: this.qtySold,
      valueBought: this.valueBought,
      valueSold: this.valueSold,
      cost: this.cost,
      maxCash: this.maxCash,
      transactions: [...this.transactions],
    };
  }

  private averagePrice(): number {
    const traded = this.qtyBought + this.qtySold;
    return traded > 0 ? (this.valueSold + this.valueBought) / traded : 0;
  }

  private updatePnl(): void {
    const pnl = this.pnl();
    this.pnlValue = pnl;
    this.minPnl = this.minPnl === null ? pnl : Math.min(this.minPnl, pnl);
    this.maxPnl = this.maxPnl === null ? pnl : Math.max(this.maxPnl, pnl);
    if (this.maxCash !== 0) {
      this.pnlRatio = pnl / this.maxCash;
    }
  }
}

/**
 * Cash plus one {@link PositionBook} per traded instrument.
 */
export class Portfolio {
  public readonly initialCash: number;

  private cashBalance: number;
  private readonly books = new Map<string, PositionBook>();

  public constructor(initialCash: number) {
    this.initialCash = initialCash;
    this.cashBalance = initialCash;
  }

  public get cash(): number {
    return this.cashBalance;
  }

  public quantityOf(symbol: string): number {
    return this.books.get(symbol)?.quantity ?? 0;
  }

  public applyFill(fill: Fill): void {
    this.book(fill.symbol).applyFill(fill);
    const signedValue = (fill.side === "buy" ? fill.quantity : -fill.quantity) * fill.price;
    this.cashBalance -= signedValue + fill.fees;
  }

  public markToMarket(symbol: string, close: number): void {
    this.book(symbol).markToMarket(close);
  }

  /** Cash plus open positions at their latest close. */
  public equity(): number {
    let value = this.cashBalance;
    for (const book of this.books.values()) {
      value += book.marketValue();
    }
    return value;
  }

  public stats(): PortfolioStats {
    const positions = Array.from(this.books.values(), (book) => book.stats()).sort(
      (a, b) => b.pnlRatio - a.pnlRatio,
    );
    const pnl = positions.reduce((total, position) => total + position.pnl, 0);
    return {
      pnl,
      initialCash: this.initialCash,
      cash: this.cashBalance,
      pnlRatio: pnl / this.initialCash,
      positions,
    };
  }

  private book(symbol: string): PositionBook {
    let book = this.books.get(symbol);
    if (!book) {
      book = new PositionBook(symbol);
      this.books.set(symbol, book);
    }
    return book;
  }
}
