import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { LoansModule } from '../loans/loans.module';
import { LibraryQueryService } from './library-query.service';
import { LibraryController } from './library.controller';

@Module({
  imports: [CatalogModule, LoansModule],
  controllers: [LibraryController],
  providers: [LibraryQueryService],
  exports: [LibraryQueryService],
})
export class LibraryModule {}
