import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, Repository } from 'typeorm';
import { Loan } from './entities/loan.entity';
import { isStorableId } from '../database/postgres-errors';

/** Read side of the loan history. Loans are append-only; writes go through LoansService. */
@Injectable()
export class LoanLedgerService {
  constructor(@InjectRepository(Loan) private loanRepo: Repository<Loan>) {}

  async getLoan(id: number): Promise<Loan | null> {
    if (!isStorableId(id)) return null;
    return this.loanRepo.findOne({ where: { id }, relations: { book: true, borrower: true } });
  }

  listOpen(): Promise<Loan[]> {
    return this.loanRepo.find({
      where: { returnedAt: IsNull() },
      relations: { book: true, borrower: true },
      order: { dueAt: 'ASC' },
    });
  }

  async historyForBorrower(borrowerId: number): Promise<Loan[]> {
    if (!isStorableId(borrowerId)) return [];
    return this.loanRepo.find({ where: { borrowerId }, relations: { book: true }, order: { loanedAt: 'DESC' } });
  }

  historyForBook(bookIsbn: string): Promise<Loan[]> {
    return this.loanRepo.find({ where: { bookIsbn }, relations: { borrower: true }, order: { loanedAt: 'DESC' } });
  }
}
