import { PartialType } from '@nestjs/mapped-types';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsDateString, IsEnum, IsOptional, IsString, IsUUID } from 'class-validator';
import { AttendanceStatus } from '../entity/attendance.entity';
import { ClassFilterQueryDto } from '../../common/dto/list-query.dto';

export class CreateAttendanceDto {
  @ApiProperty()
  @IsUUID('all', { message: 'studentId must be a valid id' })
  studentId!: string;

  @ApiProperty()
  @IsUUID('all', { message: 'classId must be a valid id' })
  classId!: string;

  @ApiProperty()
  @IsUUID('all', { message: 'subjectId must be a valid id' })
  subjectId!: string;

  @ApiProperty({ example: '2025-09-01' })
  @IsDateString({}, { message: 'Valid date is required' })
  date!: string;

  @ApiPropertyOptional({ enum: AttendanceStatus, default: AttendanceStatus.PRESENT })
  @IsOptional()
  @IsEnum(AttendanceStatus, { message: 'status must be one of present, absent, late, excused' })
  status?: AttendanceStatus;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  notes?: string;

  @ApiPropertyOptional({ description: 'Required when the caller has no teacher profile' })
  @IsOptional()
  @IsUUID('all', { message: 'markedById must be a valid id' })
  markedById?: string;
}

export class UpdateAttendanceDto extends PartialType(CreateAttendanceDto) {}

export class AttendanceQueryDto extends ClassFilterQueryDto {
  @IsOptional()
  @IsUUID('all', { message: 'studentId must be a valid id' })
  studentId?: string;

  @IsOptional()
  @IsUUID('all', { message: 'subjectId must be a valid id' })
  subjectId?: string;

  @IsOptional()
  @IsDateString({}, { message: 'date must be a valid date' })
  date?: string;

  @IsOptional()
  @IsEnum(AttendanceStatus)
  status?: AttendanceStatus;
}
