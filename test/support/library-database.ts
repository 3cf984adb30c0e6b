import { Provider } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { Author } from '../../src/catalog/entities/author.entity';
import { BOOK_PRIMARY_KEY, Book } from '../../src/catalog/entities/book.entity';
import { Category } from '../../src/catalog/entities/category.entity';
import { Borrower } from '../../src/borrowers/entities/borrower.entity';
import { Loan, OPEN_LOAN_PER_BOOK_INDEX } from '../../src/loans/entities/loan.entity';
import { InMemoryDatabase } from './in-memory-database';

export function createLibraryDatabase(): InMemoryDatabase {
  return new InMemoryDatabase([
    { entity: Author, primaryKey: 'id', generated: true, defaults: { otherDetails: null } },
    { entity: Category, primaryKey: 'id', generated: true, defaults: { otherDetails: null } },
    {
      entity: Book,
      primaryKey: 'isbn',
      primaryKeyName: BOOK_PRIMARY_KEY,
      defaults: { available: true, otherDetails: null },
      relations: {
        author: { entity: Author, localKey: 'authorId', foreignKey: 'id' },
        category: { entity: Category, localKey: 'categoryId', foreignKey: 'id' },
      },
    },
    { entity: Borrower, primaryKey: 'id', generated: true, defaults: { active: true, address: null, email: null } },
    {
      entity: Loan,
      primaryKey: 'id',
      generated: true,
      defaults: { returnedAt: null, fee: '0', otherDetails: null },
      relations: {
        book: { entity: Book, localKey: 'bookIsbn', foreignKey: 'isbn' },
        borrower: { entity: Borrower, localKey: 'borrowerId', foreignKey: 'id' },
      },
      unique: {
        name: OPEN_LOAN_PER_BOOK_INDEX,
        columns: ['bookIsbn'],
        where: (row) => row.returnedAt === null || row.returnedAt === undefined,
      },
    },
  ]);
}

/** A small catalog: three books, two authors, one borrower (id 7). */
export function seedCatalog(db: InMemoryDatabase): void {
  db.seed(Author, [
    { id: 1, firstName: 'Gabriel', lastName: 'García Márquez', nationality: 'Colombian' },
    { id: 2, firstName: 'Isabel', lastName: 'Allende', nationality: 'Chilean' },
  ]);
  db.seed(Category, [{ id: 1, description: 'Novel' }]);
  db.seed(Book, [
    { isbn: '978-0001', title: 'One Hundred Years of Solitude', publisher: 'Sudamericana', publicationDate: '1967-05-30', authorId: 1, categoryId: 1 },
    { isbn: '978-0002', title: 'Love in the Time of Cholera', publisher: 'Oveja Negra', publicationDate: '1985-09-05', authorId: 1, categoryId: 1 },
    { isbn: '978-0003', title: 'The House of the Spirits', publisher: 'Plaza & Janés', publicationDate: '1982-01-01', authorId: 2, categoryId: 1 },
  ]);
  db.seed(Borrower, [{ id: 7, firstName: 'Ana', lastName: 'Pérez', email: 'ana@example.test' }]);
}

export function libraryTestingModule(db: InMemoryDatabase, providers: Provider[]): Promise<TestingModule> {
  return Test.createTestingModule({
    providers: [
      ...providers,
      { provide: DataSource, useValue: db },
      { provide: getRepositoryToken(Author), useValue: db.getRepository(Author) },
      { provide: getRepositoryToken(Category), useValue: db.getRepository(Category) },
      { provide: getRepositoryToken(Book), useValue: db.getRepository(Book) },
      { provide: getRepositoryToken(Borrower), useValue: db.getRepository(Borrower) },
      { provide: getRepositoryToken(Loan), useValue: db.getRepository(Loan) },
    ],
  }).compile();
}

export function findBook(db: InMemoryDatabase, isbn: string): Book | undefined {
  return db.all(Book).find((book) => book.isbn === isbn);
}
