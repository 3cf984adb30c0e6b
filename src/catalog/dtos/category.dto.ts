import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class CreateCategoryDto {
  @ApiProperty({ example: 'Novel' })
  @IsString() @IsNotEmpty() @MaxLength(100)
  description!: string;

  @ApiPropertyOptional()
  @IsOptional() @IsString()
  otherDetails?: string;
}

export class UpdateCategoryDto {
  @ApiPropertyOptional()
  @IsOptional() @IsString() @IsNotEmpty() @MaxLength(100)
  description?: string;

  @ApiPropertyOptional()
  @IsOptional() @IsString()
  otherDetails?: string;
}
