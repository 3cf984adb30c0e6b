import {
  Body,
  ConflictException,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  InternalServerErrorException,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { LoansService } from './loans.service';
import { LoanLedgerService } from './loan-ledger.service';
import { CreateLoanDto } from './dtos/loan.dto';
import { LoanResult } from './loan-result';

@ApiTags('Loans')
@Controller('loans')
export class LoansController {
  constructor(
    private readonly loans: LoansService,
    private readonly ledger: LoanLedgerService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Lend a book to a borrower for 14 days' })
  @ApiResponse({ status: 404, description: 'Book or borrower not found' })
  @ApiResponse({ status: 409, description: 'Book already loaned' })
  async createLoan(@Body() dto: CreateLoanDto) {
    return unwrap(await this.loans.createLoan(dto.bookIsbn, dto.borrowerId));
  }

  @Post(':id/return')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Return a loaned book' })
  @ApiResponse({ status: 404, description: 'Loan not found' })
  @ApiResponse({ status: 409, description: 'Loan already returned' })
  async returnLoan(@Param('id', ParseIntPipe) id: number) {
    return unwrap(await this.loans.returnLoan(id));
  }

  @Get(':id')
  async getLoan(@Param('id', ParseIntPipe) id: number) {
    const loan = await this.ledger.getLoan(id);
    if (!loan) throw new NotFoundException('Loan not found');
    return loan;
  }
}

function unwrap(result: LoanResult): LoanResult {
  if (result.success) return result;
  switch (result.reason) {
    case 'NOT_FOUND':
      throw new NotFoundException(result.message);
    case 'CONFLICT':
      throw new ConflictException(result.message);
    default:
      throw new InternalServerErrorException(result.message);
  }
}
