import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { Borrower } from './entities/borrower.entity';
import { CreateBorrowerDto, UpdateBorrowerDto } from './dtos/borrower.dto';
import { OperationResult } from '../common/types/operation-result';
import { describeError, errorStack } from '../common/utils/errors';
import { isStorableId } from '../database/postgres-errors';

export interface BorrowerResult extends OperationResult {
  borrower?: Borrower;
}

@Injectable()
export class BorrowersService {
  private readonly logger = new Logger(BorrowersService.name);

  constructor(@InjectRepository(Borrower) private borrowerRepo: Repository<Borrower>) {}

  async getBorrower(id: number): Promise<Borrower | null> {
    if (!isStorableId(id)) return null;
    return this.borrowerRepo.findOne({ where: { id } });
  }

  listBorrowers(where?: FindOptionsWhere<Borrower>): Promise<Borrower[]> {
    return this.borrowerRepo.find({ where, order: { lastName: 'ASC', firstName: 'ASC' } });
  }

  createBorrower(dto: CreateBorrowerDto): Promise<Borrower> {
    const borrower = this.borrowerRepo.create({
      firstName: dto.firstName,
      lastName: dto.lastName,
      address: dto.address ?? null,
      email: dto.email ?? null,
      active: true,
    });
    return this.borrowerRepo.save(borrower);
  }

  async updateBorrower(id: number, dto: UpdateBorrowerDto): Promise<Borrower> {
    const borrower = await this.getBorrower(id);
    if (!borrower) throw new NotFoundException('Borrower not found');
    if (dto.firstName !== undefined) borrower.firstName = dto.firstName;
    if (dto.lastName !== undefined) borrower.lastName = dto.lastName;
    if (dto.address !== undefined) borrower.address = dto.address;
    if (dto.email !== undefined) borrower.email = dto.email;
    if (dto.active !== undefined) borrower.active = dto.active;
    return this.borrowerRepo.save(borrower);
  }

  /** Creates a borrower and reports the outcome instead of throwing. */
  async registerBorrower(dto: CreateBorrowerDto): Promise<BorrowerResult> {
    try {
      const borrower = await this.createBorrower(dto);
      this.logger.log(`Borrower ${borrower.id} registered`);
      return {
        success: true,
        message: `Borrower ${dto.firstName} ${dto.lastName} created successfully.`,
        borrower,
      };
    } catch (error) {
      this.logger.error(`Error creating borrower: ${describeError(error)}`, errorStack(error));
      return { success: false, message: `Error creating borrower: ${describeError(error)}` };
    }
  }
}
