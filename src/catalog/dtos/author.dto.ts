import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class CreateAuthorDto {
  @ApiProperty()
  @IsString() @IsNotEmpty() @MaxLength(100)
  firstName!: string;

  @ApiProperty()
  @IsString() @IsNotEmpty() @MaxLength(100)
  lastName!: string;

  @ApiProperty()
  @IsString() @IsNotEmpty() @MaxLength(100)
  nationality!: string;

  @ApiPropertyOptional()
  @IsOptional() @IsString()
  otherDetails?: string;
}

export class UpdateAuthorDto {
  @ApiPropertyOptional()
  @IsOptional() @IsString() @IsNotEmpty() @MaxLength(100)
  firstName?: string;

  @ApiPropertyOptional()
  @IsOptional() @IsString() @IsNotEmpty() @MaxLength(100)
  lastName?: string;

  @ApiPropertyOptional()
  @IsOptional() @IsString() @IsNotEmpty() @MaxLength(100)
  nationality?: string;

  @ApiPropertyOptional()
  @IsOptional() @IsString()
  otherDetails?: string;
}
