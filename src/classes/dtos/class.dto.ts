import { PartialType } from '@nestjs/mapped-types';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  MaxLength,
  Min,
} from 'class-validator';

export class CreateClassDto {
  @ApiProperty({ example: 'Grade 5 - A' })
  @IsNotEmpty({ message: 'name should not be empty' })
  @IsString()
  @MaxLength(50)
  name!: string;

  @ApiProperty({ example: '5' })
  @IsNotEmpty({ message: 'gradeLevel should not be empty' })
  @IsString()
  @MaxLength(10)
  gradeLevel!: string;

  @ApiProperty({ example: 'A' })
  @IsNotEmpty({ message: 'section should not be empty' })
  @IsString()
  @MaxLength(5)
  section!: string;

  @ApiProperty({ example: '2025-2026' })
  @IsNotEmpty({ message: 'academicYear should not be empty' })
  @IsString()
  @MaxLength(20)
  academicYear!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsUUID('all', { message: 'teacherId must be a valid id' })
  teacherId?: string | null;

  @ApiPropertyOptional({ type: [String] })
  @IsOptional()
  @IsArray()
  @IsUUID('all', { each: true })
  subjectIds?: string[];

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(20)
  roomNumber?: string;

  @ApiPropertyOptional({ default: 30 })
  @IsOptional()
  @IsInt()
  @Min(1)
  maxStudents?: number;

  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class UpdateClassDto extends PartialType(CreateClassDto) {}
