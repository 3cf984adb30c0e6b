import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsDateString, IsInt, IsNotEmpty, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { PG_MAX_INTEGER } from '../../database/postgres-errors';

export class CreateBookDto {
  @ApiProperty({ example: '978-0307474728' })
  @IsString() @IsNotEmpty() @MaxLength(20)
  isbn!: string;

  @ApiProperty()
  @IsString() @IsNotEmpty() @MaxLength(200)
  title!: string;

  @ApiProperty({ description: 'Publishing house' })
  @IsString() @IsNotEmpty() @MaxLength(100)
  publisher!: string;

  @ApiProperty({ example: '1967-05-30' })
  @IsDateString()
  publicationDate!: string;

  @ApiProperty()
  @IsInt() @Min(1) @Max(PG_MAX_INTEGER)
  categoryId!: number;

  @ApiProperty()
  @IsInt() @Min(1) @Max(PG_MAX_INTEGER)
  authorId!: number;

  @ApiPropertyOptional()
  @IsOptional() @IsString()
  otherDetails?: string;
}

// Availability is owned by the loan lifecycle and is deliberately absent here
export class UpdateBookDto {
  @ApiPropertyOptional()
  @IsOptional() @IsString() @IsNotEmpty() @MaxLength(200)
  title?: string;

  @ApiPropertyOptional()
  @IsOptional() @IsString() @IsNotEmpty() @MaxLength(100)
  publisher?: string;

  @ApiPropertyOptional()
  @IsOptional() @IsDateString()
  publicationDate?: string;

  @ApiPropertyOptional()
  @IsOptional() @IsInt() @Min(1) @Max(PG_MAX_INTEGER)
  categoryId?: number;

  @ApiPropertyOptional()
  @IsOptional() @IsInt() @Min(1) @Max(PG_MAX_INTEGER)
  authorId?: number;

  @ApiPropertyOptional()
  @IsOptional() @IsString()
  otherDetails?: string;
}
