import { Entity, PrimaryGeneratedColumn, Column, OneToMany } from 'typeorm';
import { Book } from './book.entity';

@Entity()
export class Category {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ length: 100 })
  description!: string; // e.g. "Novel", "History"

  @Column({ type: 'text', nullable: true })
  otherDetails?: string | null;

  @OneToMany(() => Book, (book) => book.category)
  books?: Book[];
}
