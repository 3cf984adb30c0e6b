import { Injectable, Logger } from '@nestjs/common';
import { Like } from 'typeorm';
import { CatalogService } from '../catalog/catalog.service';
import { Book } from '../catalog/entities/book.entity';
import { LoanLedgerService } from '../loans/loan-ledger.service';
import { Loan } from '../loans/entities/loan.entity';
import { describeError, errorStack } from '../common/utils/errors';

// Postgres LIKE uses backslash as its default escape character
export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Read-only views for the presentation layer. A failed read is logged and
 * degrades to an empty list so callers never crash on a transient outage.
 */
@Injectable()
export class LibraryQueryService {
  private readonly logger = new Logger(LibraryQueryService.name);

  constructor(
    private readonly catalog: CatalogService,
    private readonly ledger: LoanLedgerService,
  ) {}

  listAll(): Promise<Book[]> {
    return this.readOrEmpty('listing books', () => this.catalog.listBooks());
  }

  listAvailable(): Promise<Book[]> {
    return this.readOrEmpty('listing available books', () => this.catalog.listBooks({ available: true }));
  }

  /** Substring match on title, ISBN and author names; case is preserved. */
  search(term: string): Promise<Book[]> {
    if (!term || !term.trim()) return this.listAll();
    const pattern = `%${escapeLikePattern(term)}%`;
    return this.readOrEmpty(`searching books for "${term}"`, () =>
      this.catalog.listBooks([
        { title: Like(pattern) },
        { isbn: Like(pattern) },
        { author: { firstName: Like(pattern) } },
        { author: { lastName: Like(pattern) } },
      ]),
    );
  }

  listOpenLoans(): Promise<Loan[]> {
    return this.readOrEmpty('listing open loans', () => this.ledger.listOpen());
  }

  loanHistoryForBook(isbn: string): Promise<Loan[]> {
    return this.readOrEmpty(`listing loans of book ${isbn}`, () => this.ledger.historyForBook(isbn));
  }

  private async readOrEmpty<T>(operation: string, read: () => Promise<T[]>): Promise<T[]> {
    try {
      return await read();
    } catch (error) {
      this.logger.error(`Error ${operation}: ${describeError(error)}`, errorStack(error));
      return [];
    }
  }
}
