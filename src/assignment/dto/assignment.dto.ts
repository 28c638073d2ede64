import { PartialType } from '@nestjs/mapped-types';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsBoolean,
  IsDateString,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  MaxLength,
  Min,
} from 'class-validator';
import { AssignmentType } from '../entities/assignment.entity';
import { ClassFilterQueryDto } from '../../common/dto/list-query.dto';

export class CreateAssignmentDto {
  @ApiProperty()
  @IsNotEmpty({ message: 'title should not be empty' })
  @IsString()
  @MaxLength(200)
  title!: string;

  @ApiProperty()
  @IsNotEmpty({ message: 'description should not be empty' })
  @IsString()
  description!: string;

  @ApiProperty()
  @IsUUID('all', { message: 'subjectId must be a valid id' })
  subjectId!: string;

  @ApiProperty()
  @IsUUID('all', { message: 'classId must be a valid id' })
  classId!: string;

  @ApiPropertyOptional({ description: 'Required when the caller has no teacher profile' })
  @IsOptional()
  @IsUUID('all', { message: 'teacherId must be a valid id' })
  teacherId?: string;

  @ApiPropertyOptional({ enum: AssignmentType, default: AssignmentType.HOMEWORK })
  @IsOptional()
  @IsEnum(AssignmentType, { message: 'assignmentType must be one of homework, project, quiz, test, exam' })
  assignmentType?: AssignmentType;

  @ApiPropertyOptional({ default: 100, minimum: 1 })
  @IsOptional()
  @IsInt({ message: 'totalMarks must be an integer' })
  @Min(1, { message: 'totalMarks must be at least 1' })
  totalMarks?: number;

  @ApiProperty()
  @IsDateString({}, { message: 'dueDate must be a valid date' })
  dueDate!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  instructions?: string;

  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class UpdateAssignmentDto extends PartialType(CreateAssignmentDto) {}

export class AssignmentQueryDto extends ClassFilterQueryDto {
  @IsOptional()
  @IsUUID('all', { message: 'subjectId must be a valid id' })
  subjectId?: string;
}
