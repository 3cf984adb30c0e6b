import { Test, TestingModule } from '@nestjs/testing';
import { ConflictException, InternalServerErrorException, NotFoundException } from '@nestjs/common';
import { LoansController } from './loans.controller';
import { LoansService } from './loans.service';
import { LoanLedgerService } from './loan-ledger.service';
import { LoanMessages } from './loan-result';

describe('LoansController', () => {
  let controller: LoansController;
  const loansService = { createLoan: jest.fn(), returnLoan: jest.fn() };
  const ledger = { getLoan: jest.fn() };

  beforeEach(async () => {
    jest.resetAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      controllers: [LoansController],
      providers: [
        { provide: LoansService, useValue: loansService },
        { provide: LoanLedgerService, useValue: ledger },
      ],
    }).compile();

    controller = module.get<LoansController>(LoansController);
  });

  it('returns the result of a successful loan', async () => {
    const result = { success: true, message: LoanMessages.LOAN_CREATED };
    loansService.createLoan.mockResolvedValue(result);

    await expect(controller.createLoan({ bookIsbn: '978-0001', borrowerId: 7 })).resolves.toBe(result);
    expect(loansService.createLoan).toHaveBeenCalledWith('978-0001', 7);
  });

  it('maps NOT_FOUND to 404', async () => {
    loansService.createLoan.mockResolvedValue({
      success: false,
      reason: 'NOT_FOUND',
      message: LoanMessages.BOOK_NOT_FOUND,
    });

    await expect(controller.createLoan({ bookIsbn: '978-9999', borrowerId: 7 })).rejects.toThrow(
      new NotFoundException(LoanMessages.BOOK_NOT_FOUND),
    );
  });

  it('maps CONFLICT to 409', async () => {
    loansService.returnLoan.mockResolvedValue({
      success: false,
      reason: 'CONFLICT',
      message: LoanMessages.ALREADY_RETURNED,
    });

    await expect(controller.returnLoan(3)).rejects.toThrow(ConflictException);
    expect(loansService.returnLoan).toHaveBeenCalledWith(3);
  });

  it('maps persistence failures to 500', async () => {
    loansService.returnLoan.mockResolvedValue({
      success: false,
      reason: 'PERSISTENCE_FAILURE',
      message: 'Error processing return: deadlock detected',
    });

    await expect(controller.returnLoan(3)).rejects.toThrow(InternalServerErrorException);
  });

  it('returns 404 for an unknown loan id', async () => {
    ledger.getLoan.mockResolvedValue(null);

    await expect(controller.getLoan(42)).rejects.toThrow(NotFoundException);
  });
});
