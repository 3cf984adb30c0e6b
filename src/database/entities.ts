import { Author } from '../catalog/entities/author.entity';
import { Book } from '../catalog/entities/book.entity';
import { Category } from '../catalog/entities/category.entity';
import { Borrower } from '../borrowers/entities/borrower.entity';
import { Loan } from '../loans/entities/loan.entity';

export const LIBRARY_ENTITIES = [Author, Category, Book, Borrower, Loan];
