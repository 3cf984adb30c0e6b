import {
  Body,
  Controller,
  Get,
  InternalServerErrorException,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  Put,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { BorrowersService } from './borrowers.service';
import { CreateBorrowerDto, UpdateBorrowerDto } from './dtos/borrower.dto';
import { LoanLedgerService } from '../loans/loan-ledger.service';

@ApiTags('Borrowers')
@Controller('borrowers')
export class BorrowersController {
  constructor(
    private readonly borrowers: BorrowersService,
    private readonly ledger: LoanLedgerService,
  ) {}

  @Get()
  list() {
    return this.borrowers.listBorrowers();
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number) {
    const borrower = await this.borrowers.getBorrower(id);
    if (!borrower) throw new NotFoundException('Borrower not found');
    return borrower;
  }

  @Post()
  async register(@Body() dto: CreateBorrowerDto) {
    const result = await this.borrowers.registerBorrower(dto);
    if (!result.success) throw new InternalServerErrorException(result.message);
    return result;
  }

  @Put(':id')
  update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateBorrowerDto) {
    return this.borrowers.updateBorrower(id, dto);
  }

  @Get(':id/loans')
  loans(@Param('id', ParseIntPipe) id: number) {
    return this.ledger.historyForBorrower(id);
  }
}
