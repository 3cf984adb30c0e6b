import { Body, Controller, Get, NotFoundException, Param, ParseIntPipe, Post, Put } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { CatalogService } from './catalog.service';
import { CreateBookDto, UpdateBookDto } from './dtos/book.dto';
import { CreateAuthorDto, UpdateAuthorDto } from './dtos/author.dto';
import { CreateCategoryDto, UpdateCategoryDto } from './dtos/category.dto';

@ApiTags('Catalog')
@Controller('catalog')
export class CatalogController {
  constructor(private readonly catalog: CatalogService) {}

  // Books
  @Get('books')
  listBooks() {
    return this.catalog.listBooks();
  }

  @Get('books/:isbn')
  async getBook(@Param('isbn') isbn: string) {
    const book = await this.catalog.getBook(isbn);
    if (!book) throw new NotFoundException('Book not found');
    return book;
  }

  @Post('books')
  @ApiOperation({ summary: 'Add a book to the catalog (starts out available)' })
  createBook(@Body() dto: CreateBookDto) {
    return this.catalog.createBook(dto);
  }

  @Put('books/:isbn')
  updateBook(@Param('isbn') isbn: string, @Body() dto: UpdateBookDto) {
    return this.catalog.updateBook(isbn, dto);
  }

  // Authors
  @Get('authors')
  listAuthors() {
    return this.catalog.listAuthors();
  }

  @Post('authors')
  createAuthor(@Body() dto: CreateAuthorDto) {
    return this.catalog.createAuthor(dto);
  }

  @Put('authors/:id')
  updateAuthor(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateAuthorDto) {
    return this.catalog.updateAuthor(id, dto);
  }

  // Categories
  @Get('categories')
  listCategories() {
    return this.catalog.listCategories();
  }

  @Post('categories')
  createCategory(@Body() dto: CreateCategoryDto) {
    return this.catalog.createCategory(dto);
  }

  @Put('categories/:id')
  updateCategory(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateCategoryDto) {
    return this.catalog.updateCategory(id, dto);
  }
}
