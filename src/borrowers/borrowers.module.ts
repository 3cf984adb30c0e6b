import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Borrower } from './entities/borrower.entity';
import { BorrowersService } from './borrowers.service';
import { BorrowersController } from './borrowers.controller';
import { LoansModule } from '../loans/loans.module';

@Module({
  imports: [TypeOrmModule.forFeature([Borrower]), LoansModule],
  controllers: [BorrowersController],
  providers: [BorrowersService],
  exports: [BorrowersService],
})
export class BorrowersModule {}
