import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsNotEmpty, IsString, Max, MaxLength, Min } from 'class-validator';
import { PG_MAX_INTEGER } from '../../database/postgres-errors';

export class CreateLoanDto {
  @ApiProperty({ example: '978-0307474728' })
  @IsString() @IsNotEmpty() @MaxLength(20)
  bookIsbn!: string;

  @ApiProperty()
  @IsInt() @Min(1) @Max(PG_MAX_INTEGER)
  borrowerId!: number;
}
