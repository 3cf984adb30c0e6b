import { Entity, PrimaryColumn, Column, ManyToOne, JoinColumn, CreateDateColumn, UpdateDateColumn } from 'typeorm';
import { Author } from './author.entity';
import { Category } from './category.entity';

export const BOOK_PRIMARY_KEY = 'PK_book_isbn';

@Entity()
export class Book {
  @PrimaryColumn({ type: 'varchar', length: 20, primaryKeyConstraintName: BOOK_PRIMARY_KEY })
  isbn!: string;

  @Column({ length: 200 })
  title!: string;

  @Column({ length: 100 })
  publisher!: string;

  @Column({ type: 'date' })
  publicationDate!: string; // YYYY-MM-DD

  @Column({ type: 'int' })
  categoryId!: number;

  @ManyToOne(() => Category, (category) => category.books)
  @JoinColumn({ name: 'categoryId' })
  category?: Category;

  @Column({ type: 'int' })
  authorId!: number;

  @ManyToOne(() => Author, (author) => author.books)
  @JoinColumn({ name: 'authorId' })
  author?: Author;

  @Column({ type: 'text', nullable: true })
  otherDetails?: string | null;

  // Written only by the loan lifecycle; false while an open loan references this book
  @Column({ default: true })
  available!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
