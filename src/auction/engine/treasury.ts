interface AssetBook {
  held: number;
  owed: number;
}

export interface TreasuryBalance extends AssetBook {
  asset: string;
  free: number;
}

/**
 * What the engine holds per asset versus what it owes to owners and bidders.
 * Only the difference is recoverable.
 */
export class Treasury {
  private readonly books = new Map<string, AssetBook>();

  balance(asset: string): TreasuryBalance {
    const book = this.books.get(asset) ?? { held: 0, owed: 0 };
    return { asset, ...book, free: book.held - book.owed };
  }

  /** Funds or assets received on someone's behalf. */
  receiveOwed(asset: string, amount: number): void {
    const book = this.book(asset);
    book.held += amount;
    book.owed += amount;
  }

  /** Owed funds paid out to their owner. */
  payOwed(asset: string, amount: number): void {
    const book = this.book(asset);
    book.held -= amount;
    book.owed -= amount;
  }

  /** Owed funds that become the engine's own (platform fee). */
  retain(asset: string, amount: number): void {
    this.book(asset).owed -= amount;
  }

  /** Free funds paid out by recovery. */
  payFree(asset: string, amount: number): void {
    this.book(asset).held -= amount;
  }

  private book(asset: string): AssetBook {
    let book = this.books.get(asset);
    if (!book) {
      book = { held: 0, owed: 0 };
      this.books.set(asset, book);
    }
    return book;
  }
}
