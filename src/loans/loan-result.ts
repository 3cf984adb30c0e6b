import { OperationResult } from '../common/types/operation-result';
import { Loan } from './entities/loan.entity';

export type LoanFailureReason = 'NOT_FOUND' | 'CONFLICT' | 'PERSISTENCE_FAILURE';

export interface LoanResult extends OperationResult {
  reason?: LoanFailureReason;
  loan?: Loan;
}

export const LoanMessages = {
  BOOK_NOT_FOUND: 'Book not found.',
  BORROWER_NOT_FOUND: 'Borrower not found.',
  LOAN_NOT_FOUND: 'Loan not found.',
  ALREADY_RETURNED: 'This loan was already returned.',
  LOAN_CREATED: 'Loan created successfully.',
  BOOK_RETURNED: 'Book returned successfully.',
  LOAN_ERROR: 'Error processing loan',
  RETURN_ERROR: 'Error processing return',
  alreadyLoaned: (title: string) => `The book '${title}' is already loaned.`,
} as const;

export function loanFailure(reason: LoanFailureReason, message: string): LoanResult {
  return { success: false, reason, message };
}
