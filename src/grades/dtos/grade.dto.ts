import { PartialType } from '@nestjs/mapped-types';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNumber, IsOptional, IsString, IsUUID, Max, Min } from 'class-validator';
import { ListQueryDto } from '../../common/dto/list-query.dto';

export class CreateGradeDto {
  @ApiProperty()
  @IsUUID('all', { message: 'studentId must be a valid id' })
  studentId!: string;

  @ApiProperty()
  @IsUUID('all', { message: 'assignmentId must be a valid id' })
  assignmentId!: string;

  @ApiProperty({ minimum: 0, example: 45 })
  @IsNumber({ maxDecimalPlaces: 2 }, { message: 'marksObtained must be a number with at most 2 decimals' })
  @Min(0, { message: 'marksObtained cannot be negative' })
  @Max(999.99)
  marksObtained!: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  comments?: string;

  @ApiPropertyOptional({ description: 'Required when the caller has no teacher profile' })
  @IsOptional()
  @IsUUID('all', { message: 'gradedById must be a valid id' })
  gradedById?: string;
}

export class UpdateGradeDto extends PartialType(CreateGradeDto) {}

export class GradeQueryDto extends ListQueryDto {
  @IsOptional()
  @IsUUID('all', { message: 'studentId must be a valid id' })
  studentId?: string;

  @IsOptional()
  @IsUUID('all', { message: 'assignmentId must be a valid id' })
  assignmentId?: string;
}
