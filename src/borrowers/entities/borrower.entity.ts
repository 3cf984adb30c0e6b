import { Entity, PrimaryGeneratedColumn, Column, OneToMany, CreateDateColumn } from 'typeorm';
import { Loan } from '../../loans/entities/loan.entity';

@Entity()
export class Borrower {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ length: 100 })
  firstName!: string;

  @Column({ length: 100 })
  lastName!: string;

  @Column({ type: 'varchar', length: 200, nullable: true })
  address?: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  email?: string | null;

  @Column({ default: true })
  active!: boolean;

  @OneToMany(() => Loan, (loan) => loan.borrower)
  loans?: Loan[];

  @CreateDateColumn()
  createdAt!: Date;

  get fullName(): string {
    return `${this.firstName} ${this.lastName}`;
  }
}
