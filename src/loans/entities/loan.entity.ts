import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Index } from 'typeorm';
import { Book } from '../../catalog/entities/book.entity';
import { Borrower } from '../../borrowers/entities/borrower.entity';

export const OPEN_LOAN_PER_BOOK_INDEX = 'UQ_loan_open_book';

@Entity()
@Index(OPEN_LOAN_PER_BOOK_INDEX, ['bookIsbn'], { unique: true, where: '"returnedAt" IS NULL' })
export class Loan {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 20 })
  bookIsbn!: string;

  @ManyToOne(() => Book)
  @JoinColumn({ name: 'bookIsbn' })
  book?: Book | null;

  @Column({ type: 'int' })
  borrowerId!: number;

  @ManyToOne(() => Borrower, (borrower) => borrower.loans)
  @JoinColumn({ name: 'borrowerId' })
  borrower?: Borrower;

  @Column({ type: 'timestamp' })
  loanedAt!: Date;

  @Column({ type: 'timestamp' })
  dueAt!: Date;

  // null while the loan is open
  @Column({ type: 'timestamp', nullable: true })
  returnedAt!: Date | null;

  @Column({ type: 'decimal', precision: 10, scale: 2, default: 0 })
  fee!: string; // store as string to preserve precision

  @Column({ type: 'text', nullable: true })
  otherDetails?: string | null;
}
