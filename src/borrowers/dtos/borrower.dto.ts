import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsEmail, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class CreateBorrowerDto {
  @ApiProperty()
  @IsString() @IsNotEmpty() @MaxLength(100)
  firstName!: string;

  @ApiProperty()
  @IsString() @IsNotEmpty() @MaxLength(100)
  lastName!: string;

  @ApiPropertyOptional()
  @IsOptional() @IsString() @MaxLength(200)
  address?: string;

  @ApiPropertyOptional()
  @IsOptional() @IsEmail() @MaxLength(100)
  email?: string;
}

export class UpdateBorrowerDto {
  @ApiPropertyOptional()
  @IsOptional() @IsString() @IsNotEmpty() @MaxLength(100)
  firstName?: string;

  @ApiPropertyOptional()
  @IsOptional() @IsString() @IsNotEmpty() @MaxLength(100)
  lastName?: string;

  @ApiPropertyOptional()
  @IsOptional() @IsString() @MaxLength(200)
  address?: string;

  @ApiPropertyOptional()
  @IsOptional() @IsEmail() @MaxLength(100)
  email?: string;

  @ApiPropertyOptional()
  @IsOptional() @IsBoolean()
  active?: boolean;
}
