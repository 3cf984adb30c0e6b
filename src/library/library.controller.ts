import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { LibraryQueryService } from './library-query.service';

@ApiTags('Library')
@Controller('library')
export class LibraryController {
  constructor(private readonly library: LibraryQueryService) {}

  @Get('books')
  listBooks() {
    return this.library.listAll();
  }

  @Get('books/available')
  listAvailable() {
    return this.library.listAvailable();
  }

  @Get('books/search')
  @ApiOperation({ summary: 'Substring search over title, ISBN and author names' })
  @ApiQuery({ name: 'q', required: false })
  search(@Query('q') q?: string) {
    return this.library.search(q ?? '');
  }

  @Get('books/:isbn/loans')
  bookLoans(@Param('isbn') isbn: string) {
    return this.library.loanHistoryForBook(isbn);
  }

  @Get('loans/open')
  openLoans() {
    return this.library.listOpenLoans();
  }
}
