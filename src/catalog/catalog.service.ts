import { ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { BOOK_PRIMARY_KEY, Book } from './entities/book.entity';
import { Author } from './entities/author.entity';
import { Category } from './entities/category.entity';
import { CreateBookDto, UpdateBookDto } from './dtos/book.dto';
import { CreateAuthorDto, UpdateAuthorDto } from './dtos/author.dto';
import { CreateCategoryDto, UpdateCategoryDto } from './dtos/category.dto';
import { isStorableId, isUniqueViolation } from '../database/postgres-errors';

export type BookFilter = FindOptionsWhere<Book> | FindOptionsWhere<Book>[];

type BookChanges = Partial<Pick<Book, 'title' | 'publisher' | 'publicationDate' | 'authorId' | 'categoryId' | 'otherDetails'>>;

/**
 * Storage for books, authors and categories.
 *
 * No operation here writes `Book.available`; that flag belongs to the loan
 * lifecycle (see LoansService). Book writes are plain INSERTs and column-wise
 * UPDATEs so a loan committed meanwhile keeps its flag.
 */
@Injectable()
export class CatalogService {
  constructor(
    @InjectRepository(Book) private bookRepo: Repository<Book>,
    @InjectRepository(Author) private authorRepo: Repository<Author>,
    @InjectRepository(Category) private categoryRepo: Repository<Category>,
  ) {}

  // Books
  getBook(isbn: string): Promise<Book | null> {
    return this.bookRepo.findOne({ where: { isbn }, relations: { author: true, category: true } });
  }

  listBooks(where?: BookFilter): Promise<Book[]> {
    return this.bookRepo.find({ where, relations: { author: true, category: true } });
  }

  async createBook(dto: CreateBookDto): Promise<Book> {
    await this.requireAuthor(dto.authorId);
    await this.requireCategory(dto.categoryId);

    try {
      await this.bookRepo.insert({
        isbn: dto.isbn,
        title: dto.title,
        publisher: dto.publisher,
        publicationDate: dto.publicationDate,
        authorId: dto.authorId,
        categoryId: dto.categoryId,
        otherDetails: dto.otherDetails ?? null,
      });
    } catch (error) {
      if (isUniqueViolation(error, BOOK_PRIMARY_KEY)) {
        throw new ConflictException(`A book with ISBN ${dto.isbn} already exists`);
      }
      throw error;
    }
    return this.requireBook(dto.isbn);
  }

  async updateBook(isbn: string, dto: UpdateBookDto): Promise<Book> {
    await this.requireBook(isbn);

    const changes: BookChanges = {};
    if (dto.authorId !== undefined) {
      await this.requireAuthor(dto.authorId);
      changes.authorId = dto.authorId;
    }
    if (dto.categoryId !== undefined) {
      await this.requireCategory(dto.categoryId);
      changes.categoryId = dto.categoryId;
    }
    if (dto.title !== undefined) changes.title = dto.title;
    if (dto.publisher !== undefined) changes.publisher = dto.publisher;
    if (dto.publicationDate !== undefined) changes.publicationDate = dto.publicationDate;
    if (dto.otherDetails !== undefined) changes.otherDetails = dto.otherDetails;

    if (Object.keys(changes).length > 0) await this.bookRepo.update({ isbn }, changes);
    return this.requireBook(isbn);
  }

  // Authors
  async getAuthor(id: number): Promise<Author | null> {
    if (!isStorableId(id)) return null;
    return this.authorRepo.findOne({ where: { id } });
  }

  listAuthors(where?: FindOptionsWhere<Author>): Promise<Author[]> {
    return this.authorRepo.find({ where, order: { lastName: 'ASC', firstName: 'ASC' } });
  }

  createAuthor(dto: CreateAuthorDto): Promise<Author> {
    const author = this.authorRepo.create({
      firstName: dto.firstName,
      lastName: dto.lastName,
      nationality: dto.nationality,
      otherDetails: dto.otherDetails ?? null,
    });
    return this.authorRepo.save(author);
  }

  async updateAuthor(id: number, dto: UpdateAuthorDto): Promise<Author> {
    const author = await this.requireAuthor(id);
    if (dto.firstName !== undefined) author.firstName = dto.firstName;
    if (dto.lastName !== undefined) author.lastName = dto.lastName;
    if (dto.nationality !== undefined) author.nationality = dto.nationality;
    if (dto.otherDetails !== undefined) author.otherDetails = dto.otherDetails;
    return this.authorRepo.save(author);
  }

  // Categories
  async getCategory(id: number): Promise<Category | null> {
    if (!isStorableId(id)) return null;
    return this.categoryRepo.findOne({ where: { id } });
  }

  listCategories(where?: FindOptionsWhere<Category>): Promise<Category[]> {
    return this.categoryRepo.find({ where, order: { description: 'ASC' } });
  }

  createCategory(dto: CreateCategoryDto): Promise<Category> {
    const category = this.categoryRepo.create({
      description: dto.description,
      otherDetails: dto.otherDetails ?? null,
    });
    return this.categoryRepo.save(category);
  }

  async updateCategory(id: number, dto: UpdateCategoryDto): Promise<Category> {
    const category = await this.requireCategory(id);
    if (dto.description !== undefined) category.description = dto.description;
    if (dto.otherDetails !== undefined) category.otherDetails = dto.otherDetails;
    return this.categoryRepo.save(category);
  }

  private async requireBook(isbn: string): Promise<Book> {
    const book = await this.getBook(isbn);
    if (!book) throw new NotFoundException('Book not found');
    return book;
  }

  private async requireAuthor(id: number): Promise<Author> {
    const author = await this.getAuthor(id);
    if (!author) throw new NotFoundException('Author not found');
    return author;
  }

  private async requireCategory(id: number): Promise<Category> {
    const category = await this.getCategory(id);
    if (!category) throw new NotFoundException('Category not found');
    return category;
  }
}
