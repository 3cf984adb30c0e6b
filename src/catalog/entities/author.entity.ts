import { Entity, PrimaryGeneratedColumn, Column, OneToMany } from 'typeorm';
import { Book } from './book.entity';

@Entity()
export class Author {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ length: 100 })
  firstName!: string;

  @Column({ length: 100 })
  lastName!: string;

  @Column({ length: 100 })
  nationality!: string;

  @Column({ type: 'text', nullable: true })
  otherDetails?: string | null;

  @OneToMany(() => Book, (book) => book.author)
  books?: Book[];

  get fullName(): string {
    return `${this.firstName} ${this.lastName}`;
  }
}
