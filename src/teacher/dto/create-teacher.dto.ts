import {
  IsNotEmpty,
  IsString,
  IsOptional,
  IsInt,
  Min,
  IsDateString,
  IsUUID,
  IsArray,
  IsBoolean,
  MaxLength,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/** Teacher profile fields shared by create, registration and conversion. */
export class TeacherProfileFieldsDto {
  @ApiProperty()
  @IsNotEmpty({ message: 'employeeId should not be empty' })
  @IsString()
  @MaxLength(20)
  employeeId!: string;

  @ApiProperty()
  @IsNotEmpty({ message: 'department should not be empty' })
  @IsString()
  @MaxLength(100)
  department!: string;

  @ApiProperty()
  @IsNotEmpty({ message: 'qualification should not be empty' })
  @IsString()
  @MaxLength(200)
  qualification!: string;

  @ApiPropertyOptional({ default: 0 })
  @IsOptional()
  @IsInt()
  @Min(0)
  experienceYears?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(200)
  specialization?: string;

  @ApiPropertyOptional({ type: [String] })
  @IsOptional()
  @IsArray()
  @IsUUID('all', { each: true })
  subjectIds?: string[];

  @ApiProperty({ example: '2024-08-15' })
  @IsDateString({}, { message: 'hireDate must be a valid date' })
  hireDate!: string;
}

export class CreateTeacherDto extends TeacherProfileFieldsDto {
  @ApiProperty()
  @IsUUID('all', { message: 'userId must be a valid id' })
  userId!: string;

  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}
