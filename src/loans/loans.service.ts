import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Book } from '../catalog/entities/book.entity';
import { Borrower } from '../borrowers/entities/borrower.entity';
import { Loan, OPEN_LOAN_PER_BOOK_INDEX } from './entities/loan.entity';
import { LoanMessages, LoanResult, loanFailure } from './loan-result';
import { isStorableId, isUniqueViolation } from '../database/postgres-errors';
import { describeError, errorStack } from '../common/utils/errors';

export const LOAN_PERIOD_DAYS = 14;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Loan lifecycle: Available -> Loaned -> Available.
 *
 * Each operation runs in its own transaction. The book row (or loan row) is
 * read FOR UPDATE so lifecycle operations on one book are serialized, and the
 * UQ_loan_open_book partial index rejects a second open loan at commit time.
 * Business failures and persistence errors come back as a LoanResult; nothing
 * is thrown to the caller.
 */
@Injectable()
export class LoansService {
  private readonly logger = new Logger(LoansService.name);

  constructor(private readonly dataSource: DataSource) {}

  async createLoan(bookIsbn: string, borrowerId: number): Promise<LoanResult> {
    let bookTitle = bookIsbn;
    try {
      return await this.dataSource.transaction(async (manager): Promise<LoanResult> => {
        const book = await manager.findOne(Book, {
          where: { isbn: bookIsbn },
          lock: { mode: 'pessimistic_write' },
        });
        if (!book) return loanFailure('NOT_FOUND', LoanMessages.BOOK_NOT_FOUND);
        bookTitle = book.title;
        if (!book.available) return loanFailure('CONFLICT', LoanMessages.alreadyLoaned(book.title));

        if (!isStorableId(borrowerId)) return loanFailure('NOT_FOUND', LoanMessages.BORROWER_NOT_FOUND);
        const borrower = await manager.findOne(Borrower, { where: { id: borrowerId } });
        if (!borrower) return loanFailure('NOT_FOUND', LoanMessages.BORROWER_NOT_FOUND);

        const loanedAt = new Date();
        const loan = await manager.save(
          manager.create(Loan, {
            bookIsbn: book.isbn,
            borrowerId: borrower.id,
            loanedAt,
            dueAt: new Date(loanedAt.getTime() + LOAN_PERIOD_DAYS * DAY_MS),
            returnedAt: null,
            fee: '0',
          }),
        );
        book.available = false;
        await manager.save(book);

        this.logger.log(`Loan ${loan.id} opened: book ${book.isbn} to borrower ${borrower.id}, due ${loan.dueAt.toISOString()}`);
        return { success: true, message: LoanMessages.LOAN_CREATED, loan };
      });
    } catch (error) {
      if (isUniqueViolation(error, OPEN_LOAN_PER_BOOK_INDEX)) {
        this.logger.warn(`Rejected second open loan for book ${bookIsbn}`);
        return loanFailure('CONFLICT', LoanMessages.alreadyLoaned(bookTitle));
      }
      this.logger.error(`${LoanMessages.LOAN_ERROR} for book ${bookIsbn}: ${describeError(error)}`, errorStack(error));
      return loanFailure('PERSISTENCE_FAILURE', `${LoanMessages.LOAN_ERROR}: ${describeError(error)}`);
    }
  }

  async returnLoan(loanId: number): Promise<LoanResult> {
    if (!isStorableId(loanId)) return loanFailure('NOT_FOUND', LoanMessages.LOAN_NOT_FOUND);
    try {
      return await this.dataSource.transaction(async (manager): Promise<LoanResult> => {
        const loan = await manager.findOne(Loan, {
          where: { id: loanId },
          lock: { mode: 'pessimistic_write' },
        });
        if (!loan) return loanFailure('NOT_FOUND', LoanMessages.LOAN_NOT_FOUND);
        if (loan.returnedAt) return loanFailure('CONFLICT', LoanMessages.ALREADY_RETURNED);

        loan.returnedAt = new Date();
        const saved = await manager.save(loan);

        // A deleted book does not block the return
        const book = await manager.findOne(Book, {
          where: { isbn: loan.bookIsbn },
          lock: { mode: 'pessimistic_write' },
        });
        if (book) {
          book.available = true;
          await manager.save(book);
        } else {
          this.logger.warn(`Loan ${loan.id} returned but book ${loan.bookIsbn} no longer exists`);
        }

        this.logger.log(`Loan ${loan.id} returned`);
        return { success: true, message: LoanMessages.BOOK_RETURNED, loan: saved };
      });
    } catch (error) {
      this.logger.error(`${LoanMessages.RETURN_ERROR} for loan ${loanId}: ${describeError(error)}`, errorStack(error));
      return loanFailure('PERSISTENCE_FAILURE', `${LoanMessages.RETURN_ERROR}: ${describeError(error)}`);
    }
  }
}
